import { z } from "zod";
import type { EncodedImage, ImageOptimizeOptions } from "../shared/contracts.js";
import { decodeUpright } from "./decode.js";
import { DEFAULT_QUALITY, resizeAndEncode, resolveCodec } from "./encode.js";
import { invalidInput } from "./errors.js";
import { base64ToBuffer, readInputFile } from "./input.js";
import type { Logger } from "./logger.js";
import type { OrientationProbe } from "./orientation.js";

// Quality is only type-checked here; range is handled by clamping.
const optimizeOptionsSchema = z
  .object({
    maxWidth: z.number().int().min(0).optional(),
    maxHeight: z.number().int().min(0).optional(),
    quality: z.number().finite().optional(),
    format: z.string().optional(),
  })
  .strict();

export type OptimizeContext = {
  /** Quality used when the options carry none. */
  defaultQuality?: number;
  probe?: OrientationProbe;
  logger?: Logger;
};

const parseOptions = (options: unknown): ImageOptimizeOptions => {
  if (options === undefined || options === null) return {};
  const parsed = optimizeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw invalidInput("Invalid image optimize options", detail);
  }
  return parsed.data;
};

/** Like `optimizeImage` but also reports the encoded dimensions and codec. */
export const optimizeImageDetailed = async (
  bytes: Uint8Array,
  options?: ImageOptimizeOptions,
  context: OptimizeContext = {}
): Promise<EncodedImage> => {
  const opts = parseOptions(options);
  const codec = resolveCodec(opts.format, opts.quality ?? context.defaultQuality ?? DEFAULT_QUALITY);
  const { pixels } = await decodeUpright(bytes, context);
  return resizeAndEncode(pixels, {
    maxWidth: opts.maxWidth ?? 0,
    maxHeight: opts.maxHeight ?? 0,
    codec,
  });
};

export const optimizeImage = async (
  bytes: Uint8Array,
  options?: ImageOptimizeOptions,
  context?: OptimizeContext
): Promise<Uint8Array> => (await optimizeImageDetailed(bytes, options, context)).bytes;

export const optimizeImageFromFile = async (
  filePath: string,
  options?: ImageOptimizeOptions,
  context?: OptimizeContext
): Promise<Uint8Array> => optimizeImage(await readInputFile(filePath), options, context);

export const optimizeImageFromBase64 = async (
  base64: string,
  options?: ImageOptimizeOptions,
  context?: OptimizeContext
): Promise<Uint8Array> => optimizeImage(base64ToBuffer(base64), options, context);

export const imageToWebp = async (
  bytes: Uint8Array,
  context?: OptimizeContext
): Promise<Uint8Array> => optimizeImage(bytes, { format: "webp" }, context);

export const imageToWebpFromFile = async (
  filePath: string,
  context?: OptimizeContext
): Promise<Uint8Array> => imageToWebp(await readInputFile(filePath), context);

export const imageToWebpFromBase64 = async (
  base64: string,
  context?: OptimizeContext
): Promise<Uint8Array> => imageToWebp(base64ToBuffer(base64), context);
