import fs from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  level?: string;
};

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  flush: () => Promise<void>;
};

export const normalizeLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn" || normalized === "warning") return "warn";
  if (normalized === "error") return "error";
  return "info";
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: "Failed to serialize log payload" });
  }
};

const buildEntry = (
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
): Record<string, unknown> => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(meta ?? {}),
});

type Sink = (line: string) => Promise<void> | void;

const createLogger = (sink: Sink, config?: LoggerConfig): Logger => {
  const threshold = normalizeLevel(config?.level);
  const pending = new Set<Promise<void>>();

  const shouldLog = (entryLevel: LogLevel): boolean =>
    LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[threshold];

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!shouldLog(entryLevel)) return;
    const line = safeStringify(buildEntry(entryLevel, message, meta));
    const result = sink(line);
    if (!result) return;
    // Log writes must never fail the pipeline.
    const tracked = result.catch(() => undefined);
    pending.add(tracked);
    void tracked.finally(() => pending.delete(tracked));
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    flush: async () => {
      await Promise.all([...pending]);
    },
  };
};

/** Appends JSON lines to `filePath`, creating its directory on first write. */
export const createFileLogger = (filePath: string, config?: LoggerConfig): Logger => {
  let queue: Promise<void> = Promise.resolve();
  const append = async (line: string): Promise<void> => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, `${line}\n`);
  };
  return createLogger((line) => {
    queue = queue.catch(() => undefined).then(() => append(line));
    return queue;
  }, config);
};

export const createConsoleLogger = (config?: LoggerConfig): Logger =>
  createLogger((line) => {
    process.stderr.write(`${line}\n`);
  }, config);

export const createNullLogger = (): Logger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  flush: async () => undefined,
});
