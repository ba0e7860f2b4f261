import exifReader from "exif-reader";
import sharp from "sharp";
import type { Orientation, OrientationHints, OrientationTag } from "../shared/contracts.js";
import { createNullLogger, type Logger } from "./logger.js";

export const isOrientationTag = (value: unknown): value is OrientationTag =>
  typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 8;

export const orientationSwapsAxes = (orientation: Orientation): boolean =>
  orientation !== "none" && orientation >= 5;

/**
 * Metadata tag first, then the decoder's own report, then "none".
 * Invalid values in either source are treated as absent.
 */
export const resolveOrientation = (hints: OrientationHints): Orientation => {
  if (isOrientationTag(hints.metadata)) return hints.metadata;
  if (isOrientationTag(hints.decoder)) return hints.decoder;
  return "none";
};

/** Orientation tag of the primary image (IFD0) from an EXIF block; thumbnail tags are ignored. */
export const parseExifOrientation = (exif: Buffer): OrientationTag | undefined => {
  const value: unknown = exifReader(exif).Image?.Orientation;
  return isOrientationTag(value) ? value : undefined;
};

export type OrientationProbe = {
  readMetadata: (bytes: Uint8Array) => Promise<OrientationTag | undefined>;
  readDecoder: (bytes: Uint8Array) => Promise<OrientationTag | undefined>;
};

export const readMetadataOrientation = async (
  bytes: Uint8Array,
  logger: Logger = createNullLogger()
): Promise<OrientationTag | undefined> => {
  try {
    const { exif } = await sharp(bytes).metadata();
    if (!exif) return undefined;
    return parseExifOrientation(exif);
  } catch (error) {
    logger.debug("orientation-metadata-unreadable", {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
};

export const readDecoderOrientation = async (
  bytes: Uint8Array,
  logger: Logger = createNullLogger()
): Promise<OrientationTag | undefined> => {
  try {
    const { orientation } = await sharp(bytes).metadata();
    return isOrientationTag(orientation) ? orientation : undefined;
  } catch (error) {
    logger.debug("orientation-decoder-unreadable", {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
};

export const createOrientationProbe = (logger?: Logger): OrientationProbe => ({
  readMetadata: (bytes) => readMetadataOrientation(bytes, logger),
  readDecoder: (bytes) => readDecoderOrientation(bytes, logger),
});

/** Never rejects: a missing or corrupt hint resolves to "none". */
export const probeOrientation = async (
  bytes: Uint8Array,
  probe: OrientationProbe = createOrientationProbe()
): Promise<Orientation> => {
  const [metadata, decoder] = await Promise.all([
    probe.readMetadata(bytes).catch(() => undefined),
    probe.readDecoder(bytes).catch(() => undefined),
  ]);
  return resolveOrientation({ metadata, decoder });
};
