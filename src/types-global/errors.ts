/**
 * @fileoverview Error types shared across the pipeline.
 * @module src/types-global/errors
 */

/**
 * Error codes raised by the pipeline.
 * `NetworkError` and `SchemaError` cover the two failure classes of the
 * upstream APIs; the rest refine them or describe local failures.
 */
export enum PipelineErrorCode {
  NetworkError = 'NETWORK_ERROR',
  Timeout = 'TIMEOUT',
  NotFound = 'NOT_FOUND',
  SchemaError = 'SCHEMA_ERROR',
  ConfigurationError = 'CONFIGURATION_ERROR',
  InternalError = 'INTERNAL_ERROR',
}

/**
 * Error carrying a {@link PipelineErrorCode} and structured details for logging.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly details?: Record<string, unknown> | undefined;

  constructor(
    code: PipelineErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

/**
 * True for errors caused by the transport rather than the payload.
 */
export function isNetworkFailure(error: unknown): boolean {
  return (
    error instanceof PipelineError &&
    (error.code === PipelineErrorCode.NetworkError ||
      error.code === PipelineErrorCode.Timeout)
  );
}
