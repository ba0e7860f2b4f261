#!/usr/bin/env tsx
/**
 * Resize and re-encode one image.
 *
 *   tsx scripts/optimize-image.ts <input> <output> [format] [max-side] [quality]
 */

import { loadEnv } from "../src/main/config.js";
import { describeError } from "../src/main/errors.js";
import { writeFileAtomic } from "../src/main/file-utils.js";
import { optimizeImageFromFile } from "../src/main/optimize.js";
import { loadRuntime } from "../src/main/runtime.js";
import { fail, formatBytes, info, section, startStep } from "./cli.js";

loadEnv();

const optionalNumber = (value: string | undefined): number | undefined =>
  value === undefined || value === "" ? undefined : Number(value);

async function main(): Promise<void> {
  const [inputPath, outputPath, format, maxSide, quality] = process.argv.slice(2);
  if (!inputPath || !outputPath) {
    fail("Usage: optimize-image <input> <output> [format] [max-side] [quality]");
    process.exitCode = 2;
    return;
  }
  const runtime = await loadRuntime();
  const bound = optionalNumber(maxSide);

  section("DOCNORM OPTIMIZE");
  info(`Input: ${inputPath}`);
  info(`Format: ${format || "auto"}`);

  const step = startStep("Optimize image");
  try {
    const output = await optimizeImageFromFile(
      inputPath,
      { format, maxWidth: bound, maxHeight: bound, quality: optionalNumber(quality) },
      runtime.optimizeContext
    );
    await writeFileAtomic(outputPath, output);
    step.end("ok", `${outputPath} (${formatBytes(output.byteLength)})`);
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
