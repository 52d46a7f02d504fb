/**
 * Pipeline Errors
 *
 * Each error carries a stable `code` that the HTTP layer copies into the
 * ErrorEnvelope and the workers record as the job failure reason.
 */

export type ErrorCode =
  | 'not_found'
  | 'no_engine_available'
  | 'extraction_failed'
  | 'invalid_transition'
  | 'missing_extraction'
  | 'invalid_request';

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input document (or addressed record) does not exist. */
export class NotFoundError extends PipelineError {
  readonly code = 'not_found';
  readonly httpStatus = 404;
}

export class JobNotFoundError extends NotFoundError {
  constructor(readonly jobId: string) {
    super(`Processing job ${jobId} not found`);
  }
}

/** No OCR or text backend is configured for the requested capability. */
export class NoEngineAvailableError extends PipelineError {
  readonly code = 'no_engine_available';
  readonly httpStatus = 503;
}

/** Every engine in the cascade threw. */
export class ExtractionError extends PipelineError {
  readonly code = 'extraction_failed';
  readonly httpStatus = 502;

  constructor(
    message: string,
    readonly failures: Array<{ engine: string; error: string }> = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class InvalidTransitionError extends PipelineError {
  readonly code = 'invalid_transition';
  readonly httpStatus = 409;

  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid job status transition: ${from} -> ${to}`);
  }
}

/** Validation was requested but payroll or feedback data is unavailable. */
export class MissingExtractionError extends PipelineError {
  readonly code = 'missing_extraction';
  readonly httpStatus = 422;
}

export class RequestValidationError extends PipelineError {
  readonly code = 'invalid_request';
  readonly httpStatus = 400;

  constructor(
    message: string,
    readonly errors: string[] = []
  ) {
    super(message);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
