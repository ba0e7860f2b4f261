import type { NormalizeRoute, RawDocument } from "../shared/contracts.js";
import { assembleContainer } from "./container.js";
import { decodeUpright } from "./decode.js";
import { clampQuality, resizeAndEncode } from "./encode.js";
import { base64ToBuffer, guessContentType, readInputFile } from "./input.js";
import { createNullLogger, type Logger } from "./logger.js";
import { defaultNormalizerConfig } from "./normalizer-config.js";
import type { OrientationProbe } from "./orientation.js";
import { applyOptimizer, type ContainerOptimizer } from "./pdf-optimizer.js";

const NORMALIZABLE_TYPES = new Set(["image/png", "image/jpeg", "image/jpg", "image/pjpeg"]);
const CONTAINER_TYPES = new Set(["application/pdf", "application/x-pdf"]);

export interface NormalizeOptions {
  /** Longest side of the embedded page image, in pixels. */
  longSideCap?: number;
  jpegQuality?: number;
  optimizer?: ContainerOptimizer;
  probe?: OrientationProbe;
  logger?: Logger;
}

/** Strips parameters (`; charset=...`) and compares case-insensitively. */
export const classifyContentType = (contentType: string): NormalizeRoute => {
  const essence = contentType.split(";")[0].trim().toLowerCase();
  if (NORMALIZABLE_TYPES.has(essence)) return "normalize";
  if (CONTAINER_TYPES.has(essence)) return "optimize-container";
  return "passthrough";
};

/**
 * Turn a document into a single-page PDF. Supported images are decoded upright,
 * capped, re-encoded as JPEG and wrapped; PDFs are offered to the optimizer; anything
 * else is returned untouched.
 */
export const normalizeDocument = async (
  doc: RawDocument,
  options: NormalizeOptions = {}
): Promise<Uint8Array> => {
  const logger = options.logger ?? createNullLogger();
  const route = classifyContentType(doc.contentType);
  logger.debug("normalize-route", { contentType: doc.contentType, route, bytes: doc.bytes.byteLength });

  if (route === "passthrough") {
    return doc.bytes;
  }
  if (route === "optimize-container") {
    return applyOptimizer(doc.bytes, options.optimizer, logger);
  }

  const longSideCap = options.longSideCap ?? defaultNormalizerConfig.normalize.long_side_cap;
  const quality = clampQuality(options.jpegQuality, defaultNormalizerConfig.normalize.jpeg_quality);

  const { pixels } = await decodeUpright(doc.bytes, { probe: options.probe, logger });
  const encoded = await resizeAndEncode(pixels, {
    maxWidth: longSideCap,
    maxHeight: longSideCap,
    codec: { kind: "jpeg", quality },
  });
  const container = assembleContainer(encoded);
  logger.debug("container-assembled", {
    width: encoded.width,
    height: encoded.height,
    imageBytes: encoded.bytes.byteLength,
    containerBytes: container.bytes.byteLength,
  });

  return applyOptimizer(container.bytes, options.optimizer, logger);
};

export const normalizeFile = async (
  filePath: string,
  contentType?: string,
  options?: NormalizeOptions
): Promise<Uint8Array> => {
  const bytes = await readInputFile(filePath);
  return normalizeDocument({ bytes, contentType: contentType ?? guessContentType(filePath) }, options);
};

export const normalizeBase64 = async (
  base64: string,
  contentType: string,
  options?: NormalizeOptions
): Promise<Uint8Array> => normalizeDocument({ bytes: base64ToBuffer(base64), contentType }, options);
