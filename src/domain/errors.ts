/**
 * Application error types
 * Each error type maps to a specific HTTP status code and to a retry policy
 * for the worker path (see isRetryableError)
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad or missing input (400 Bad Request). Never retried.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_INPUT', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Transient failure while fetching a product from the extraction source (502 Bad Gateway)
 */
export class ExtractionError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    public readonly cause?: unknown
  ) {
    super(message, 'EXTRACTION_FAILED', 502, details);
  }
}

/**
 * Storage fault while writing a product or its history (500 Internal Server Error)
 */
export class IngestionError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    public readonly cause?: unknown
  ) {
    super(message, 'INGESTION_FAILED', 500, details);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Job status change rejected by the state machine (409 Conflict)
 */
export class JobStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_JOB_TRANSITION', 409, details);
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Validation failures are permanent; every other fault on the worker path
 * (network, storage, unknown) is treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  return !(error instanceof ValidationError);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'Unexpected error';
}
