import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { createNullLogger, type Logger } from "./logger.js";

const execFileAsync = promisify(execFile);

/** Resolves to smaller bytes, or `null` to decline. */
export type ContainerOptimizer = (bytes: Uint8Array) => Promise<Uint8Array | null>;

export type GhostscriptOptions = {
  command?: string;
  timeoutMs?: number;
  logger?: Logger;
};

export const ghostscriptArgs = (inputPath: string, outputPath: string): string[] => [
  "-sDEVICE=pdfwrite",
  "-dCompatibilityLevel=1.4",
  "-dPDFSETTINGS=/screen",
  "-dNOPAUSE",
  "-dQUIET",
  "-dBATCH",
  `-sOutputFile=${outputPath}`,
  inputPath,
];

/**
 * Recompresses through Ghostscript. Declines when the binary is missing, exits non-zero,
 * times out, or produces nothing smaller.
 */
export const createGhostscriptOptimizer = (options: GhostscriptOptions = {}): ContainerOptimizer => {
  const command = options.command ?? "gs";
  const timeoutMs = options.timeoutMs ?? 30_000;
  const logger = options.logger ?? createNullLogger();

  return async (bytes) => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "docnorm-gs-"));
    const inputPath = path.join(workDir, "input.pdf");
    const outputPath = path.join(workDir, "output.pdf");
    try {
      await fs.writeFile(inputPath, bytes);
      try {
        await execFileAsync(command, ghostscriptArgs(inputPath, outputPath), { timeout: timeoutMs });
      } catch (error) {
        logger.debug("ghostscript-declined", {
          command,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
      const optimized = await fs.readFile(outputPath).catch(() => null);
      if (!optimized || optimized.byteLength === 0 || optimized.byteLength >= bytes.byteLength) {
        return null;
      }
      return optimized;
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  };
};

/**
 * Offers `bytes` to the optimizer and keeps the result only when strictly smaller.
 * A failing optimizer is logged and treated as a decline.
 */
export const applyOptimizer = async (
  bytes: Uint8Array,
  optimizer?: ContainerOptimizer,
  logger: Logger = createNullLogger()
): Promise<Uint8Array> => {
  if (!optimizer) return bytes;
  try {
    const optimized = await optimizer(bytes);
    if (optimized && optimized.byteLength > 0 && optimized.byteLength < bytes.byteLength) {
      logger.debug("container-optimized", {
        before: bytes.byteLength,
        after: optimized.byteLength,
      });
      return optimized;
    }
    return bytes;
  } catch (error) {
    logger.warn("container-optimizer-failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return bytes;
  }
};
