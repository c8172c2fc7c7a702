/**
 * Search Keys SDK - Exceptions
 *
 * Error classes for transport, decoding and server-reported failures.
 */

import type { ZodIssue } from 'zod';

/**
 * Base error class for all SDK errors.
 */
export class SearchSdkError extends Error {
  /** Error code */
  public readonly code?: string;
  /** Additional error details */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code?: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchSdkError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised when the client configuration or environment is invalid.
 */
export class ConfigurationError extends SearchSdkError {
  constructor(message: string = 'Invalid configuration', details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// Transport and decoding failures
// =============================================================================

/**
 * Raised when the request never produced a usable response: the network call
 * failed, or the body could not be decoded.
 */
export class CommunicationError extends SearchSdkError {
  constructor(message: string = 'Communication with the server failed', cause?: unknown, code: string = 'COMMUNICATION_ERROR') {
    super(message, code, undefined, { cause });
    this.name = 'CommunicationError';
  }
}

/**
 * Raised when a request times out.
 */
export class TimeoutError extends CommunicationError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs?: number;

  constructor(message: string = 'Request timed out', timeoutMs?: number, cause?: unknown) {
    super(message, cause, 'TIMEOUT');
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when a response body is not JSON or does not match the expected shape.
 */
export class InvalidResponseError extends CommunicationError {
  /** Schema issues reported while decoding, if any */
  public readonly issues: ZodIssue[];

  constructor(message: string = 'Invalid response from server', issues: ZodIssue[] = [], cause?: unknown) {
    super(message, cause, 'INVALID_RESPONSE');
    this.name = 'InvalidResponseError';
    this.issues = issues;
  }
}

// =============================================================================
// Server-reported failures
// =============================================================================

/**
 * Shape of the error body returned by the search service.
 */
export interface ApiErrorBody {
  message?: string;
  code?: string;
  type?: string;
  link?: string;
}

/**
 * Raised when the server answers with a structured error.
 *
 * The server's `code`, `type` and `link` are kept as reported.
 */
export class ApiError extends SearchSdkError {
  /** HTTP status code */
  public readonly statusCode: number;
  /** Error category reported by the server (e.g. `invalid_request`) */
  public readonly type?: string;
  /** Documentation link reported by the server */
  public readonly link?: string;

  constructor(message: string, statusCode: number, body: ApiErrorBody = {}) {
    super(message, body.code, { ...body });
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.type = body.type;
    this.link = body.link;
  }
}

/**
 * Raised when authentication fails.
 *
 * This can occur when:
 * - the API key is missing or invalid
 * - the API key lacks the action needed for the route
 */
export class AuthenticationError extends ApiError {
  constructor(message: string = 'Authentication failed', statusCode: number = 401, body?: ApiErrorBody) {
    super(message, statusCode, body);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised when a requested key is not found.
 */
export class NotFoundError extends ApiError {
  constructor(message: string = 'Resource not found', body?: ApiErrorBody) {
    super(message, 404, body);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised when there's a resource conflict.
 */
export class ConflictError extends ApiError {
  constructor(message: string = 'Resource conflict', body?: ApiErrorBody) {
    super(message, 409, body);
    this.name = 'ConflictError';
  }
}

/**
 * Raised when request validation fails, e.g. an unknown action or a past
 * `expiresAt`.
 */
export class ValidationError extends ApiError {
  constructor(message: string = 'Validation failed', statusCode: number = 400, body?: ApiErrorBody) {
    super(message, statusCode, body);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when the API rate limit is exceeded.
 *
 * @property retryAfter - Number of seconds to wait before retrying
 */
export class RateLimitError extends ApiError {
  /** Number of seconds to wait before retrying */
  public readonly retryAfter?: number;

  constructor(message: string = 'Rate limit exceeded', retryAfter?: number, body?: ApiErrorBody) {
    super(message, 429, body);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Raised when a server error occurs.
 */
export class ServerError extends ApiError {
  constructor(message: string = 'Server error', statusCode: number = 500, body?: ApiErrorBody) {
    super(message, statusCode, body);
    this.name = 'ServerError';
  }
}

/**
 * Create appropriate error from HTTP response
 */
export function createErrorFromResponse(
  statusCode: number,
  body: ApiErrorBody,
  headers?: Headers
): ApiError {
  const message = body.message || `HTTP ${statusCode}`;

  switch (statusCode) {
    case 400:
    case 422:
      return new ValidationError(message, statusCode, body);
    case 401:
    case 403:
      return new AuthenticationError(message, statusCode, body);
    case 404:
      return new NotFoundError(message, body);
    case 409:
      return new ConflictError(message, body);
    case 429: {
      const retryAfter = headers?.get('Retry-After');
      const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
      return new RateLimitError(message, Number.isNaN(seconds) ? undefined : seconds, body);
    }
    default:
      if (statusCode >= 500) {
        return new ServerError(message, statusCode, body);
      }
      return new ApiError(message, statusCode, body);
  }
}
