export type * from "./shared/contracts.js";

export {
  NormalizerError,
  decodeFailed,
  describeError,
  encodeFailed,
  extractionFailed,
  invalidInput,
  ioFailure,
  isNormalizerError,
} from "./main/errors.js";
export type { NormalizerErrorKind } from "./main/errors.js";

export {
  createConsoleLogger,
  createFileLogger,
  createNullLogger,
  normalizeLevel,
} from "./main/logger.js";
export type { LogLevel, Logger, LoggerConfig } from "./main/logger.js";

export { ENV_PREFIX, findEnvRoot, loadEnv } from "./main/config.js";
export type { LoadEnvResult } from "./main/config.js";
export {
  defaultNormalizerConfig,
  envOverridesFrom,
  loadNormalizerConfig,
  normalizerConfigSchema,
  parseNormalizerConfig,
  resolveNormalizerConfig,
} from "./main/normalizer-config.js";
export type {
  LoadedNormalizerConfig,
  NormalizerConfig,
  NormalizerConfigOverrides,
} from "./main/normalizer-config.js";

export {
  createOrientationProbe,
  isOrientationTag,
  orientationSwapsAxes,
  parseExifOrientation,
  probeOrientation,
  readDecoderOrientation,
  readMetadataOrientation,
  resolveOrientation,
} from "./main/orientation.js";
export type { OrientationProbe } from "./main/orientation.js";

export { applyOrientation, decodeImage, decodeUpright } from "./main/decode.js";
export type { UprightImage } from "./main/decode.js";
export { needsResize, resolveMaxSide, targetSize } from "./main/size-policy.js";
export type { Size } from "./main/size-policy.js";
export { DEFAULT_QUALITY, clampQuality, resizeAndEncode, resolveCodec } from "./main/encode.js";
export {
  ByteWriter,
  OBJECT_IDS,
  PDF_HEADER,
  assembleContainer,
  buildContentProgram,
  readContainerLayout,
} from "./main/container.js";

export {
  classifyContentType,
  normalizeBase64,
  normalizeDocument,
  normalizeFile,
} from "./main/pipeline.js";
export type { NormalizeOptions } from "./main/pipeline.js";

export {
  imageToWebp,
  imageToWebpFromBase64,
  imageToWebpFromFile,
  optimizeImage,
  optimizeImageDetailed,
  optimizeImageFromBase64,
  optimizeImageFromFile,
} from "./main/optimize.js";
export type { OptimizeContext } from "./main/optimize.js";

export { convertImagesToWebpRecursive } from "./main/batch-convert.js";
export type { BatchConvertOptions } from "./main/batch-convert.js";

export { base64ToBuffer, bufferToBase64, guessContentType, readInputFile } from "./main/input.js";
export { extractTextFromPdf } from "./main/text-extraction.js";
export { applyOptimizer, createGhostscriptOptimizer, ghostscriptArgs } from "./main/pdf-optimizer.js";
export type { ContainerOptimizer, GhostscriptOptions } from "./main/pdf-optimizer.js";
export { buildRuntime, createLoggerFromConfig, createOptimizerFromConfig, loadRuntime } from "./main/runtime.js";
export type { Runtime } from "./main/runtime.js";
export {
  isAlreadyExistsError,
  pathExists,
  resolveConcurrency,
  runWithConcurrency,
  writeFileAtomic,
  writeFileExclusive,
} from "./main/file-utils.js";
