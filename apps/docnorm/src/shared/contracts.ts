/**
 * Shared types for the docnorm pipeline.
 * Every value here is created and consumed within a single normalization call.
 */

export interface RawDocument {
  bytes: Uint8Array;
  contentType: string;
}

/** EXIF orientation tag values (1 = stored upright). */
export type OrientationTag = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export type Orientation = OrientationTag | "none";

export interface OrientationHints {
  metadata?: OrientationTag;
  decoder?: OrientationTag;
}

/** Interleaved RGB samples, row-major. */
export interface PixelBuffer {
  data: Uint8Array;
  width: number;
  height: number;
  channels: 3;
}

export type OutputCodec =
  | { kind: "jpeg"; quality: number }
  | { kind: "png" }
  | { kind: "webp"; quality: number };

export type CodecKind = OutputCodec["kind"];

export interface EncodedImage {
  bytes: Uint8Array;
  width: number;
  height: number;
  codec: CodecKind;
}

export type ImageFormatOption = "jpeg" | "jpg" | "png" | "webp" | "auto";

export interface ImageOptimizeOptions {
  /** 0 = unbounded */
  maxWidth?: number;
  /** 0 = unbounded */
  maxHeight?: number;
  quality?: number;
  /** Unrecognized values fall back to the same codec as "auto". */
  format?: ImageFormatOption | string;
}

export interface ResizeEncodeOptions {
  maxWidth?: number;
  maxHeight?: number;
  codec: OutputCodec;
}

export type ContainerObjectName = "catalog" | "pages" | "page" | "image" | "content";

export interface ContainerObjectRecord {
  id: number;
  name: ContainerObjectName;
  offset: number;
}

export interface ContainerDocument {
  bytes: Uint8Array;
  objects: ContainerObjectRecord[];
  xrefOffset: number;
}

export interface ContainerLayout {
  header: string;
  xrefOffset: number;
  size: number;
  rootId: number;
  offsets: number[];
}

export type NormalizeRoute = "normalize" | "optimize-container" | "passthrough";

export interface ConversionStats {
  converted: number;
  skipped: number;
  errors: number;
  errorMessages: string[];
}
