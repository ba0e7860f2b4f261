import fs from "node:fs/promises";
import path from "node:path";
import type { ConversionStats, EncodedImage, PixelBuffer } from "../shared/contracts.js";
import { decodeUpright } from "./decode.js";
import { DEFAULT_QUALITY, resizeAndEncode } from "./encode.js";
import { describeError, invalidInput, ioFailure } from "./errors.js";
import {
  isAlreadyExistsError,
  pathExists,
  resolveConcurrency,
  runWithConcurrency,
  writeFileExclusive,
} from "./file-utils.js";
import { createNullLogger, type Logger } from "./logger.js";
import { defaultNormalizerConfig } from "./normalizer-config.js";
import type { OrientationProbe } from "./orientation.js";

const CONVERTIBLE_EXT = new Set(["jpg", "jpeg", "png", "gif", "bmp", "ico", "tiff", "tif", "avif"]);

export type BatchConvertOptions = {
  concurrency?: number;
  quality?: number;
  probe?: OrientationProbe;
  logger?: Logger;
};

type FileOutcome =
  | { status: "converted" }
  | { status: "skipped"; reason: string }
  | { status: "error"; message: string };

type WalkResult = {
  files: string[];
  /** One message per directory below the root that could not be listed. */
  unreadable: string[];
};

const listFilesRecursive = async (root: string): Promise<WalkResult> => {
  const files: string[] = [];
  const unreadable: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      if (dir === root) {
        throw ioFailure(`Failed to read directory '${dir}'`, error);
      }
      unreadable.push(`Failed to read directory '${dir}': ${describeError(error)}`);
      return null;
    });
    if (!entries) return;
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isSymbolicLink()) continue;
      if (entry.isDirectory()) {
        await walk(full);
        continue;
      }
      if (entry.isFile()) {
        files.push(full);
      }
    }
  };

  await walk(root);
  return { files, unreadable };
};

const assertDirectory = async (root: string): Promise<void> => {
  if (!(await pathExists(root))) {
    throw invalidInput(`Directory does not exist: ${root}`);
  }
  const stats = await fs.stat(root).catch((error: unknown) => {
    throw ioFailure(`Failed to inspect '${root}'`, error);
  });
  if (!stats.isDirectory()) {
    throw invalidInput(`Path is not a directory: ${root}`);
  }
};

/** `photo.JPG` -> `jpg`; `""` when there is no extension. */
const extensionOf = (filePath: string): string => path.extname(filePath).slice(1).toLowerCase();

const webpSiblingOf = (filePath: string): string => {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}.webp`);
};

type ConvertContext = Required<Pick<BatchConvertOptions, "quality">> &
  BatchConvertOptions & {
    /** Targets already taken by an earlier file of this batch (`a.jpg` and `a.png` share `a.webp`). */
    claimed: Set<string>;
  };

const convertOne = async (filePath: string, context: ConvertContext): Promise<FileOutcome> => {
  const ext = extensionOf(filePath);
  if (ext.length === 0) return { status: "skipped", reason: "no-extension" };
  if (ext === "webp") return { status: "skipped", reason: "already-webp" };
  if (!CONVERTIBLE_EXT.has(ext)) return { status: "skipped", reason: "unsupported-extension" };

  // Claimed before the first await so files keep their listing order.
  const target = webpSiblingOf(filePath);
  if (context.claimed.has(target)) return { status: "skipped", reason: "target-claimed" };
  context.claimed.add(target);
  if (await pathExists(target)) return { status: "skipped", reason: "target-exists" };

  let pixels: PixelBuffer;
  try {
    const bytes = await fs.readFile(filePath);
    ({ pixels } = await decodeUpright(bytes, { probe: context.probe, logger: context.logger }));
  } catch (error) {
    return { status: "error", message: `Failed to open image '${filePath}': ${describeError(error)}` };
  }

  let encoded: EncodedImage;
  try {
    encoded = await resizeAndEncode(pixels, { codec: { kind: "webp", quality: context.quality } });
  } catch (error) {
    return {
      status: "error",
      message: `Failed to encode WebP for '${filePath}': ${describeError(error)}`,
    };
  }

  try {
    await writeFileExclusive(target, encoded.bytes);
  } catch (error) {
    // Created by someone else since the existence check.
    if (isAlreadyExistsError(error)) return { status: "skipped", reason: "target-exists" };
    return {
      status: "error",
      message: `Failed to write WebP file '${target}': ${describeError(error)}`,
    };
  }
  return { status: "converted" };
};

/**
 * Writes a `.webp` sibling for every convertible image under `root`. Originals are
 * kept and existing siblings are never overwritten. Per-file failures and
 * subdirectories that cannot be listed are collected in the returned stats rather
 * than thrown; only an unusable root rejects.
 */
export const convertImagesToWebpRecursive = async (
  root: string,
  options: BatchConvertOptions = {}
): Promise<ConversionStats> => {
  const logger = options.logger ?? createNullLogger();
  await assertDirectory(root);

  const { files, unreadable } = await listFilesRecursive(root);
  const concurrency = resolveConcurrency(options.concurrency, defaultNormalizerConfig.batch.concurrency);
  const quality = options.quality ?? DEFAULT_QUALITY;
  logger.info("batch-convert-start", { root, files: files.length, concurrency });

  const claimed = new Set<string>();
  const outcomes = await runWithConcurrency(files, concurrency, (file) =>
    convertOne(file, { ...options, quality, logger, claimed })
  );

  const stats: ConversionStats = {
    converted: 0,
    skipped: 0,
    errors: unreadable.length,
    errorMessages: [...unreadable],
  };
  unreadable.forEach((message) => logger.warn("batch-convert-unreadable-directory", { error: message }));
  outcomes.forEach((outcome, index) => {
    if (outcome.status === "converted") {
      stats.converted += 1;
    } else if (outcome.status === "skipped") {
      stats.skipped += 1;
      logger.debug("batch-convert-skipped", { file: files[index], reason: outcome.reason });
    } else {
      stats.errors += 1;
      stats.errorMessages.push(outcome.message);
      logger.warn("batch-convert-failed", { file: files[index], error: outcome.message });
    }
  });

  logger.info("batch-convert-complete", {
    root,
    converted: stats.converted,
    skipped: stats.skipped,
    errors: stats.errors,
  });
  return stats;
};
