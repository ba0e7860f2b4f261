#!/usr/bin/env tsx
/**
 * Normalize one document into a single-page PDF.
 *
 *   tsx scripts/normalize-file.ts <input> [content-type] [output]
 */

import path from "node:path";
import { loadEnv } from "../src/main/config.js";
import { describeError } from "../src/main/errors.js";
import { writeFileAtomic } from "../src/main/file-utils.js";
import { guessContentType, readInputFile } from "../src/main/input.js";
import { classifyContentType, normalizeDocument } from "../src/main/pipeline.js";
import { loadRuntime } from "../src/main/runtime.js";
import { fail, formatBytes, info, note, section, startStep } from "./cli.js";

loadEnv();

const defaultOutputPath = (inputPath: string): string => {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.normalized.pdf`);
};

async function main(): Promise<void> {
  const inputPath = process.argv[2];
  if (!inputPath) {
    fail("Usage: normalize-file <input> [content-type] [output]");
    process.exitCode = 2;
    return;
  }
  const contentType = process.argv[3] || guessContentType(inputPath);
  const outputPath = process.argv[4] || defaultOutputPath(inputPath);
  const runtime = await loadRuntime();

  section("DOCNORM NORMALIZE");
  info(`Input: ${inputPath}`);
  info(`Content type: ${contentType} (${classifyContentType(contentType)})`);
  info(`Output: ${outputPath}`);
  note(runtime.loadedFromFile ? `Config: ${runtime.configPath}` : "Config: defaults");

  const step = startStep("Normalize document");
  try {
    const bytes = await readInputFile(inputPath);
    const normalized = await normalizeDocument({ bytes, contentType }, runtime.normalizeOptions);
    await writeFileAtomic(outputPath, normalized);
    step.end("ok", `${formatBytes(bytes.byteLength)} -> ${formatBytes(normalized.byteLength)}`);
  } catch (error) {
    step.end("fail", describeError(error));
    process.exitCode = 1;
  } finally {
    await runtime.logger.flush();
  }
}

main().catch((error: unknown) => {
  fail(describeError(error));
  process.exitCode = 1;
});
