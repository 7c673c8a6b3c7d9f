/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request', code = 'BAD_REQUEST') {
    super(message, 400, code);
  }
}

/**
 * 401 Unauthorized
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized', code = 'UNAUTHORIZED') {
    super(message, 401, code);
  }
}

/**
 * 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(message = 'Not found', code = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

/**
 * 409 Conflict
 */
export class ConflictError extends AppError {
  constructor(message = 'Conflict', code = 'CONFLICT') {
    super(message, 409, code);
  }
}

/**
 * 409 - a bulk run is already active for the project
 */
export class AlreadyRunningError extends ConflictError {
  public readonly projectId: string;

  constructor(projectId: string) {
    super(`A bulk run is already active for project ${projectId}`, 'ALREADY_RUNNING');
    this.projectId = projectId;
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, 422, code);
    this.details = details;
  }
}

/**
 * Outbound URL refused by the safety checks (SSRF target, content-type, size)
 */
export class UnsafeUrlError extends ValidationError {
  public readonly url: string;

  constructor(url: string, reason: string) {
    super(reason, { url }, 'UNSAFE_URL');
    this.url = url;
  }
}

/**
 * 422 - project configuration rejected before any I/O
 */
export class ConfigurationError extends AppError {
  constructor(message = 'Invalid configuration', code = 'CONFIGURATION_ERROR') {
    super(message, 422, code);
  }
}

/**
 * Overlay rectangle does not fit inside the template
 */
export class BoundsError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'OUT_OF_BOUNDS');
  }
}

/**
 * 502 - outbound fetch failed (network, timeout, non-2xx)
 */
export class FetchFailedError extends AppError {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message, 502, 'FETCH_FAILED');
    this.url = url;
    this.status = status;
  }
}

/**
 * 502 - feed could not be fetched or parsed at the document level
 */
export class FeedError extends AppError {
  public readonly feedUrl: string;

  constructor(feedUrl: string, message: string) {
    super(message, 502, 'FEED_ERROR');
    this.feedUrl = feedUrl;
  }
}

export type CompositeFailure = 'decode_failed' | 'invalid_dimensions' | 'encode_failed';

/**
 * Image decode/encode failure; per item during bulk runs
 */
export class CompositeError extends AppError {
  public readonly kind: CompositeFailure;

  constructor(kind: CompositeFailure, message: string) {
    super(message, 422, kind.toUpperCase());
    this.kind = kind;
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', code = 'INTERNAL_ERROR') {
    super(message, 500, code, false);
  }
}

/**
 * Normalize unknown thrown values into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
