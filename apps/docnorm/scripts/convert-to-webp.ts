#!/usr/bin/env tsx
/**
 * Write a .webp sibling for every convertible image under a directory.
 *
 *   tsx scripts/convert-to-webp.ts <dir> [concurrency]
 */

import { convertImagesToWebpRecursive } from "../src/main/batch-convert.js";
import { loadEnv } from "../src/main/config.js";
import { describeError } from "../src/main/errors.js";
import { resolveConcurrency } from "../src/main/file-utils.js";
import { loadRuntime } from "../src/main/runtime.js";
import { fail, info, note, section, startStep } from "./cli.js";

loadEnv();

async function main(): Promise<void> {
  const root = process.argv[2];
  if (!root) {
    fail("Usage: convert-to-webp <dir> [concurrency]");
    process.exitCode = 2;
    return;
  }
  const runtime = await loadRuntime();
  const concurrency = resolveConcurrency(process.argv[3], runtime.config.batch.concurrency);

  section("DOCNORM WEBP CONVERSION");
  info(`Root: ${root}`);
  info(`Concurrency: ${concurrency}`);

  const step = startStep("Convert images");
  try {
    const stats = await convertImagesToWebpRecursive(root, { ...runtime.batchOptions, concurrency });
    step.end(
      stats.errors > 0 ? "warn" : "ok",
      `${stats.converted} converted, ${stats.skipped} skipped, ${stats.errors} failed`
    );
    stats.errorMessages.forEach((message) => note(message));
    if (stats.errors > 0) process.exitCode = 1;
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
