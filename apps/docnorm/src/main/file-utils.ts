import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

export const writeFileAtomic = async (filePath: string, data: Uint8Array): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
};

/**
 * Like `writeFileAtomic` but never replaces an existing file: the temp file is
 * hard-linked into place, so a taken `filePath` rejects with `EEXIST`.
 */
export const writeFileExclusive = async (filePath: string, data: Uint8Array): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempPath, data);
    await fs.link(tempPath, filePath);
  } finally {
    await fs.rm(tempPath, { force: true });
  }
};

export const isAlreadyExistsError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "EEXIST";

export const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const resolveConcurrency = (value: unknown, fallback: number, max = 32): number => {
  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed < 1) {
    return fallback;
  }
  return Math.min(max, Math.floor(parsed));
};

/** Runs `worker` over `items` with at most `limit` in flight; results keep input order. */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;
  const lanes = Math.max(1, Math.min(limit, items.length));

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => runLane()));
  return results;
};
