/**
 * Application error hierarchy.
 * Each AppError carries the HTTP status and API error code it maps to,
 * so the error-handler middleware can render it without a lookup table.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly statusCode: number,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type ValidationErrorKind = 'MissingField' | 'EmptyMessage' | 'TooLong';

export class ValidationError extends AppError {
  constructor(
    readonly kind: ValidationErrorKind,
    message: string
  ) {
    super('INVALID_REQUEST', 400, message, { kind });
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Feedback not found') {
    super('NOT_FOUND', 404, message);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(readonly limitBytes: number) {
    super('INVALID_REQUEST', 413, `Request body exceeds ${limitBytes} bytes`, { limitBytes });
  }
}

/**
 * The store could not be reached, was locked past its timeout, or rejected
 * the statement. The driver error is kept on `cause` for logs only.
 */
export class StorageUnavailableError extends AppError {
  constructor(
    readonly operation: string,
    cause?: unknown
  ) {
    super('SERVICE_UNAVAILABLE', 503, 'Service unavailable');
    this.cause = cause;
  }
}

/** Raised at startup when the environment holds an unusable value. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
