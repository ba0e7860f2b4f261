import sharp from "sharp";
import type { Orientation, PixelBuffer } from "../shared/contracts.js";
import { decodeFailed } from "./errors.js";
import { createNullLogger, type Logger } from "./logger.js";
import { createOrientationProbe, orientationSwapsAxes, probeOrientation, type OrientationProbe } from "./orientation.js";

const CHANNELS = 3;
const FLATTEN_BACKGROUND = "#ffffff";

/**
 * Decode any format sharp can sniff from the bytes into upright-agnostic RGB samples.
 * Orientation is NOT applied here.
 */
export const decodeImage = async (bytes: Uint8Array): Promise<PixelBuffer> => {
  try {
    const { data, info } = await sharp(bytes)
      .flatten({ background: FLATTEN_BACKGROUND })
      .toColourspace("srgb")
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== CHANNELS) {
      throw new Error(`unexpected channel count ${info.channels}`);
    }
    return { data, width: info.width, height: info.height, channels: CHANNELS };
  } catch (error) {
    throw decodeFailed(error);
  }
};

type SourceIndex = (x: number, y: number, width: number, height: number) => [number, number];

// Maps an output pixel back to its stored pixel; width/height are the stored dimensions.
const SOURCE_INDEX: Record<Exclude<Orientation, "none" | 1>, SourceIndex> = {
  2: (x, y, w) => [w - 1 - x, y],
  3: (x, y, w, h) => [w - 1 - x, h - 1 - y],
  4: (x, y, _w, h) => [x, h - 1 - y],
  5: (x, y) => [y, x],
  6: (x, y, _w, h) => [y, h - 1 - x],
  7: (x, y, w, h) => [w - 1 - y, h - 1 - x],
  8: (x, y, w) => [w - 1 - y, x],
};

/** Returns a new buffer with the EXIF transform applied; the input is left untouched. */
export const applyOrientation = (pixels: PixelBuffer, orientation: Orientation): PixelBuffer => {
  if (orientation === "none" || orientation === 1) {
    return { ...pixels, data: Uint8Array.from(pixels.data) };
  }

  const { width, height, data } = pixels;
  const swap = orientationSwapsAxes(orientation);
  const outWidth = swap ? height : width;
  const outHeight = swap ? width : height;
  const source = SOURCE_INDEX[orientation];
  const out = new Uint8Array(outWidth * outHeight * CHANNELS);

  for (let y = 0; y < outHeight; y++) {
    for (let x = 0; x < outWidth; x++) {
      const [sx, sy] = source(x, y, width, height);
      const from = (sy * width + sx) * CHANNELS;
      const to = (y * outWidth + x) * CHANNELS;
      out[to] = data[from];
      out[to + 1] = data[from + 1];
      out[to + 2] = data[from + 2];
    }
  }

  return { data: out, width: outWidth, height: outHeight, channels: CHANNELS };
};

export interface UprightImage {
  pixels: PixelBuffer;
  orientation: Orientation;
}

export const decodeUpright = async (
  bytes: Uint8Array,
  options?: { probe?: OrientationProbe; logger?: Logger }
): Promise<UprightImage> => {
  const logger = options?.logger ?? createNullLogger();
  const decoded = await decodeImage(bytes);
  const orientation = await probeOrientation(bytes, options?.probe ?? createOrientationProbe(logger));
  const pixels = applyOrientation(decoded, orientation);
  logger.debug("decoded", {
    storedWidth: decoded.width,
    storedHeight: decoded.height,
    width: pixels.width,
    height: pixels.height,
    orientation,
  });
  return { pixels, orientation };
};
