import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";

export const PDF_OPTIMIZER_ENGINES = ["none", "ghostscript"] as const;

export const normalizerConfigSchema = z.object({
  normalize: z.object({
    long_side_cap: z.number().int().positive(),
    jpeg_quality: z.number().int().min(1).max(100),
  }),
  optimize: z.object({
    default_quality: z.number().int().min(1).max(100),
  }),
  batch: z.object({
    concurrency: z.number().int().min(1).max(32),
  }),
  pdf_optimizer: z.object({
    engine: z.enum(PDF_OPTIMIZER_ENGINES),
    command: z.string().min(1),
    timeout_ms: z.number().int().positive(),
  }),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
    file: z.string().min(1).nullable(),
  }),
});

export type NormalizerConfig = z.infer<typeof normalizerConfigSchema>;

export type NormalizerConfigOverrides = {
  [K in keyof NormalizerConfig]?: Partial<NormalizerConfig[K]>;
};

export const defaultNormalizerConfig: NormalizerConfig = {
  normalize: { long_side_cap: 2000, jpeg_quality: 75 },
  optimize: { default_quality: 80 },
  batch: { concurrency: 4 },
  pdf_optimizer: { engine: "none", command: "gs", timeout_ms: 30_000 },
  logging: { level: "info", file: null },
};

const resolveConfigPath = (configPath?: string): string =>
  configPath ??
  process.env.DOCNORM_CONFIG_PATH ??
  path.join(process.cwd(), "config", "docnorm.yaml");

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const mergeDeep = (
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> => {
  const output: Record<string, unknown> = { ...target };
  Object.entries(source).forEach(([key, value]) => {
    if (value === undefined) return;
    const base = output[key];
    if (isPlainObject(value) && isPlainObject(base)) {
      output[key] = mergeDeep(base, value);
      return;
    }
    output[key] = value;
  });
  return output;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");

export const parseNormalizerConfig = (
  base: NormalizerConfig,
  source: Record<string, unknown>
): NormalizerConfig => {
  const parsed = normalizerConfigSchema.safeParse(mergeDeep(base, source));
  if (!parsed.success) {
    throw new Error(`Invalid docnorm config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export type LoadedNormalizerConfig = {
  config: NormalizerConfig;
  configPath: string;
  loadedFromFile: boolean;
};

/** A missing file yields the defaults; a present but invalid file throws. */
export const loadNormalizerConfig = async (configPath?: string): Promise<LoadedNormalizerConfig> => {
  const resolvedPath = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch {
    return { config: defaultNormalizerConfig, configPath: resolvedPath, loadedFromFile: false };
  }

  const parsed: unknown = YAML.parse(raw);
  if (!isPlainObject(parsed)) {
    return { config: defaultNormalizerConfig, configPath: resolvedPath, loadedFromFile: false };
  }
  return {
    config: parseNormalizerConfig(defaultNormalizerConfig, parsed),
    configPath: resolvedPath,
    loadedFromFile: true,
  };
};

const readPositiveInt = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
};

export const envOverridesFrom = (
  env: Record<string, string | undefined>
): NormalizerConfigOverrides => {
  const overrides: NormalizerConfigOverrides = {};
  const cap = readPositiveInt(env.DOCNORM_LONG_SIDE_CAP);
  const quality = readPositiveInt(env.DOCNORM_JPEG_QUALITY);
  const concurrency = readPositiveInt(env.DOCNORM_BATCH_CONCURRENCY);
  const engine = env.DOCNORM_PDF_OPTIMIZER?.trim().toLowerCase();
  const level = env.DOCNORM_LOG_LEVEL?.trim().toLowerCase();

  if (cap !== undefined || quality !== undefined) {
    overrides.normalize = {
      ...(cap !== undefined ? { long_side_cap: cap } : {}),
      ...(quality !== undefined ? { jpeg_quality: Math.min(100, quality) } : {}),
    };
  }
  if (concurrency !== undefined) {
    overrides.batch = { concurrency: Math.min(32, concurrency) };
  }
  if (engine === "none" || engine === "ghostscript") {
    overrides.pdf_optimizer = { engine };
  }
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    overrides.logging = { level };
  }
  return overrides;
};

/** Precedence: base config < explicit overrides < environment. */
export const resolveNormalizerConfig = (
  base: NormalizerConfig,
  options?: { overrides?: NormalizerConfigOverrides; env?: Record<string, string | undefined> }
): NormalizerConfig => {
  const withOverrides = parseNormalizerConfig(base, options?.overrides ?? {});
  return parseNormalizerConfig(withOverrides, envOverridesFrom(options?.env ?? {}));
};
