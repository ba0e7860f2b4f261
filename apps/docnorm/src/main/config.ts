import fs from "node:fs";
import path from "node:path";
import * as dotenv from "dotenv";

export const ENV_PREFIX = "DOCNORM_";

// Earlier files win: machine-local values shadow the shared `.env`.
const ENV_FILES = [".env.local", ".env"];

export type LoadEnvResult = {
  loadedFiles: string[];
  /** `DOCNORM_*` keys this call added to the environment. */
  appliedKeys: string[];
};

const declaresWorkspaces = (dir: string): boolean => {
  const manifestPath = path.join(dir, "package.json");
  if (!isFile(manifestPath)) return false;
  const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  return typeof manifest === "object" && manifest !== null && "workspaces" in manifest;
};

const isFile = (filePath: string): boolean =>
  fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;

/** Nearest ancestor of `startDir` (itself included) holding the workspace manifest. */
export const findEnvRoot = (startDir: string): string => {
  let current = path.resolve(startDir);
  for (;;) {
    if (declaresWorkspaces(current)) return current;
    const parent = path.dirname(current);
    if (parent === current) return path.resolve(startDir);
    current = parent;
  }
};

/**
 * Reads `.env.local` then `.env` from the workspace root into `env`. Only `DOCNORM_*`
 * keys are taken, and a key that is already set is never replaced.
 */
export const loadEnv = (options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): LoadEnvResult => {
  const env = options.env ?? process.env;
  const root = findEnvRoot(options.cwd ?? process.cwd());
  const loadedFiles = ENV_FILES.map((name) => path.join(root, name)).filter(isFile);
  const appliedKeys: string[] = [];

  for (const filePath of loadedFiles) {
    const parsed = dotenv.parse(fs.readFileSync(filePath));
    for (const [key, value] of Object.entries(parsed)) {
      if (!key.startsWith(ENV_PREFIX) || env[key] !== undefined) continue;
      env[key] = value;
      appliedKeys.push(key);
    }
  }

  return { loadedFiles, appliedKeys };
};
