export type NormalizerErrorKind =
  | "DecodeFailed"
  | "EncodeFailed"
  | "InvalidInput"
  | "IoFailure"
  | "ExtractionFailed";

const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return String(cause);
};

/**
 * Error raised by every pipeline stage. `kind` is stable and safe to branch on;
 * the message always carries the underlying cause.
 */
export class NormalizerError extends Error {
  public readonly kind: NormalizerErrorKind;
  public readonly context?: Record<string, unknown>;

  constructor(
    kind: NormalizerErrorKind,
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "NormalizerError";
    this.kind = kind;
    this.context = options?.context;
  }
}

export const isNormalizerError = (value: unknown): value is NormalizerError =>
  value instanceof NormalizerError;

export const decodeFailed = (cause: unknown, context?: Record<string, unknown>): NormalizerError =>
  new NormalizerError("DecodeFailed", `Failed to process image: ${describeCause(cause)}`, {
    cause,
    context,
  });

export const encodeFailed = (cause: unknown, context?: Record<string, unknown>): NormalizerError =>
  new NormalizerError("EncodeFailed", `Failed to encode image: ${describeCause(cause)}`, {
    cause,
    context,
  });

export const invalidInput = (message: string, cause?: unknown): NormalizerError =>
  new NormalizerError(
    "InvalidInput",
    cause === undefined ? message : `${message}: ${describeCause(cause)}`,
    { cause }
  );

export const ioFailure = (message: string, cause?: unknown): NormalizerError =>
  new NormalizerError("IoFailure", cause === undefined ? message : `${message}: ${describeCause(cause)}`, {
    cause,
  });

export const extractionFailed = (cause: unknown): NormalizerError =>
  new NormalizerError(
    "ExtractionFailed",
    `Failed to extract text from PDF: ${describeCause(cause)}`,
    { cause }
  );

export const describeError = (error: unknown): string => describeCause(error);
