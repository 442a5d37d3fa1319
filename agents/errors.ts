export type PipelineErrorKind =
  | "NotFound"
  | "NetworkError"
  | "InsufficientData"
  | "CorruptReading"
  | "InvalidInput"
  | "Timeout"
  | "Unexpected";

export interface PipelineErrorDetail {
  kind: PipelineErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: PipelineErrorKind,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.details = options?.details;
  }

  toDetail(): PipelineErrorDetail {
    return this.details
      ? { kind: this.kind, message: this.message, details: this.details }
      : { kind: this.kind, message: this.message };
  }
}

/**
 * Raised by provider collaborators. Only lookup and transport failures cross
 * the provider boundary.
 */
export class ProviderError extends PipelineError {
  declare readonly kind: "NotFound" | "NetworkError";

  constructor(
    kind: "NotFound" | "NetworkError",
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(kind, message, options);
    this.name = "ProviderError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
