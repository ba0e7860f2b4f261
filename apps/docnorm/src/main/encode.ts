import sharp from "sharp";
import type {
  EncodedImage,
  OutputCodec,
  PixelBuffer,
  ResizeEncodeOptions,
} from "../shared/contracts.js";
import { encodeFailed } from "./errors.js";
import { needsResize, resolveMaxSide, targetSize } from "./size-policy.js";

export const DEFAULT_QUALITY = 80;
const MIN_QUALITY = 1;
const MAX_QUALITY = 100;

/** Out-of-range values are clamped, never rejected. */
export const clampQuality = (quality?: number, fallback = DEFAULT_QUALITY): number => {
  if (typeof quality !== "number" || !Number.isFinite(quality)) return fallback;
  return Math.max(MIN_QUALITY, Math.min(MAX_QUALITY, Math.round(quality)));
};

/** "auto", absent and unrecognized formats all share the PNG fallback. */
export const resolveCodec = (format: string | undefined, quality?: number): OutputCodec => {
  const q = clampQuality(quality);
  switch (String(format ?? "auto").trim().toLowerCase()) {
    case "jpeg":
    case "jpg":
      return { kind: "jpeg", quality: q };
    case "webp":
      return { kind: "webp", quality: q };
    case "png":
      return { kind: "png" };
    default:
      return { kind: "png" };
  }
};

const applyCodec = (image: sharp.Sharp, codec: OutputCodec): sharp.Sharp => {
  switch (codec.kind) {
    case "jpeg":
      return image.jpeg({ quality: codec.quality, chromaSubsampling: "4:2:0" });
    case "webp":
      return image.webp({ quality: codec.quality });
    case "png":
      return image.png({ compressionLevel: 6 });
  }
};

/**
 * Downscale with Lanczos-3 when a bound is exceeded, then encode.
 * The returned dimensions are those of the encoded pixels.
 */
export const resizeAndEncode = async (
  pixels: PixelBuffer,
  options: ResizeEncodeOptions
): Promise<EncodedImage> => {
  const { width, height, channels } = pixels;
  const maxSide = resolveMaxSide(options.maxWidth, options.maxHeight);
  const target =
    maxSide !== undefined && needsResize(width, height, options.maxWidth, options.maxHeight)
      ? targetSize(width, height, maxSide)
      : { width, height };

  try {
    let image = sharp(pixels.data, { raw: { width, height, channels } });
    if (target.width !== width || target.height !== height) {
      image = image.resize(target.width, target.height, { fit: "fill", kernel: "lanczos3" });
    }
    const { data, info } = await applyCodec(image, options.codec).toBuffer({
      resolveWithObject: true,
    });
    return { bytes: data, width: info.width, height: info.height, codec: options.codec.kind };
  } catch (error) {
    throw encodeFailed(error, { codec: options.codec.kind, width: target.width, height: target.height });
  }
};
