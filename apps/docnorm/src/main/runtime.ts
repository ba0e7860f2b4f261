import { createConsoleLogger, createFileLogger, type Logger } from "./logger.js";
import {
  loadNormalizerConfig,
  resolveNormalizerConfig,
  type NormalizerConfig,
  type NormalizerConfigOverrides,
} from "./normalizer-config.js";
import type { BatchConvertOptions } from "./batch-convert.js";
import type { OptimizeContext } from "./optimize.js";
import type { NormalizeOptions } from "./pipeline.js";
import { createGhostscriptOptimizer, type ContainerOptimizer } from "./pdf-optimizer.js";

export type Runtime = {
  config: NormalizerConfig;
  configPath: string;
  loadedFromFile: boolean;
  logger: Logger;
  normalizeOptions: NormalizeOptions;
  optimizeContext: OptimizeContext;
  batchOptions: BatchConvertOptions;
};

export const createLoggerFromConfig = (config: NormalizerConfig): Logger =>
  config.logging.file
    ? createFileLogger(config.logging.file, { level: config.logging.level })
    : createConsoleLogger({ level: config.logging.level });

export const createOptimizerFromConfig = (
  config: NormalizerConfig,
  logger: Logger
): ContainerOptimizer | undefined => {
  if (config.pdf_optimizer.engine !== "ghostscript") return undefined;
  return createGhostscriptOptimizer({
    command: config.pdf_optimizer.command,
    timeoutMs: config.pdf_optimizer.timeout_ms,
    logger,
  });
};

/** Option bags for each entry point, derived from one resolved config. */
export const buildRuntime = (
  config: NormalizerConfig,
  logger: Logger = createLoggerFromConfig(config)
): Omit<Runtime, "configPath" | "loadedFromFile"> => ({
  config,
  logger,
  normalizeOptions: {
    longSideCap: config.normalize.long_side_cap,
    jpegQuality: config.normalize.jpeg_quality,
    optimizer: createOptimizerFromConfig(config, logger),
    logger,
  },
  optimizeContext: { defaultQuality: config.optimize.default_quality, logger },
  batchOptions: {
    concurrency: config.batch.concurrency,
    quality: config.optimize.default_quality,
    logger,
  },
});

export const loadRuntime = async (
  options: {
    configPath?: string;
    overrides?: NormalizerConfigOverrides;
    env?: Record<string, string | undefined>;
  } = {}
): Promise<Runtime> => {
  const loaded = await loadNormalizerConfig(options.configPath);
  const config = resolveNormalizerConfig(loaded.config, {
    overrides: options.overrides,
    env: options.env ?? process.env,
  });
  return {
    ...buildRuntime(config),
    configPath: loaded.configPath,
    loadedFromFile: loaded.loadedFromFile,
  };
};
