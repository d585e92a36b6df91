/**
 * API error taxonomy and the payload every failed request returns.
 */

export type ErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'INTERNAL_ERROR';

/** Field name (as sent on the wire) to the reason it was rejected. */
export type FieldErrors = Record<string, string>;

export interface ErrorPayload {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: FieldErrors;
}

export const apiError = (code: ErrorCode, message: string, details?: FieldErrors): ErrorPayload => ({
  code,
  message,
  ...(details !== undefined && { details })
});

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(statusCode: number, code: ErrorCode, message: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
  }

  toResponse(): ErrorPayload {
    return apiError(this.code, this.message);
  }
}

export class ValidationError extends ApiError {
  readonly details: FieldErrors;

  constructor(message: string, details: FieldErrors) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.details = details;
  }

  override toResponse(): ErrorPayload {
    return apiError(this.code, this.message, this.details);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';
