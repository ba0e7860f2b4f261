#!/usr/bin/env tsx
/** Print the text layer of a PDF to stdout. */

import { describeError } from "../src/main/errors.js";
import { readInputFile } from "../src/main/input.js";
import { extractTextFromPdf } from "../src/main/text-extraction.js";
import { fail } from "./cli.js";

async function main(): Promise<void> {
  const inputPath = process.argv[2];
  if (!inputPath) {
    fail("Usage: extract-text <pdf>");
    process.exitCode = 2;
    return;
  }
  const text = await extractTextFromPdf(await readInputFile(inputPath));
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
}

main().catch((error: unknown) => {
  fail(describeError(error));
  process.exitCode = 1;
});
