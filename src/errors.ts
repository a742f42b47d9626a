/**
 * Application error hierarchy.
 * The error handler middleware maps every AppError to its status code and a
 * structured JSON body; anything else becomes a generic 500.
 */

import type { ErrorCode, FieldError } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Request is not usable at all (e.g. body is not JSON). */
export class InvalidRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'INVALID_REQUEST', message, details);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number) {
    super(413, 'PAYLOAD_TOO_LARGE', `Request body must be ${limitBytes} bytes or less`, {
      limitBytes,
    });
  }
}

/** Input parsed but violates the record shape. Carries every field violation. */
export class ValidationError extends AppError {
  readonly fields: FieldError[];

  constructor(fields: FieldError[]) {
    super(422, 'VALIDATION_ERROR', 'Request failed validation', { fields });
    this.fields = fields;
  }
}

/**
 * Storage unavailable or write rejected.
 * The public message stays generic; the driver's message lives in `cause`.
 */
export class PersistenceError extends AppError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(500, 'PERSISTENCE_ERROR', 'The evaluation store is unavailable');
    this.operation = operation;
    this.cause = cause;
  }

  /** Internal description of the underlying failure, for logs only. */
  get internalMessage(): string {
    if (this.cause instanceof Error) return this.cause.message;
    if (this.cause && typeof this.cause === 'object' && 'message' in this.cause) {
      return String(this.cause.message);
    }
    return this.cause === undefined ? 'unknown' : String(this.cause);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
