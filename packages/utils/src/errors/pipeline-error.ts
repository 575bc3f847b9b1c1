import type { PipelineErrorCode } from '@pricepipe/schemas';

/**
 * Error raised by pipeline components.
 *
 * `code` identifies the failure class (see PipelineErrorCodeSchema);
 * `details` carries structured context for logs.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: PipelineErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
