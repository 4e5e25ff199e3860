/**
 * Custom error classes for the TubeChat client
 */

import type { ErrorCategory, ErrorResponse } from './types';

const TRANSCRIPT_ERROR_CODES = new Set(['no_caption_metadata', 'no_transcript_available', 'empty_transcript']);

/**
 * Base class for all API errors
 */
export class APIError extends Error {
  statusCode?: number;
  errorCode?: string;
  category?: ErrorCategory;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode?: number,
    errorCode?: string,
    details?: Record<string, unknown>,
    category?: ErrorCategory
  ) {
    super(message);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.details = details;
    this.category = category;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [this.message];
    if (this.statusCode) {
      parts.push(`(status: ${this.statusCode})`);
    }
    if (this.errorCode) {
      parts.push(`(code: ${this.errorCode})`);
    }
    return parts.join(' ');
  }
}

/**
 * Request was rejected as malformed (400/422)
 */
export class ValidationError extends APIError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>, category?: ErrorCategory) {
    super(message, statusCode, errorCode, details, category);
    this.name = 'ValidationError';
  }
}

/**
 * The video URL could not be resolved to a video ID
 */
export class InvalidVideoUrlError extends ValidationError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>, category?: ErrorCategory) {
    super(message, statusCode, errorCode, details, category);
    this.name = 'InvalidVideoUrlError';
  }
}

/**
 * The video has no usable captions
 */
export class TranscriptUnavailableError extends APIError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>, category?: ErrorCategory) {
    super(message, statusCode, errorCode, details, category);
    this.name = 'TranscriptUnavailableError';
  }
}

/**
 * Resource not found
 */
export class NotFoundError extends APIError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>, category?: ErrorCategory) {
    super(message, statusCode, errorCode, details, category);
    this.name = 'NotFoundError';
  }
}

/**
 * Chat session unknown, deleted or expired
 */
export class SessionNotFoundError extends NotFoundError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>, category?: ErrorCategory) {
    super(message, statusCode, errorCode, details, category);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Server error (5xx)
 */
export class ServerError extends APIError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>, category?: ErrorCategory) {
    super(message, statusCode, errorCode, details, category);
    this.name = 'ServerError';
  }
}

/**
 * Network connection error
 */
export class NetworkError extends APIError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * Request timeout
 */
export class TimeoutError extends APIError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an arbitrary JSON body to the API's error shape
 */
export function parseErrorResponse(data: unknown): ErrorResponse | undefined {
  if (!isRecord(data) || typeof data.error !== 'string') return undefined;
  const body: ErrorResponse = {
    error: data.error,
    message: typeof data.message === 'string' ? data.message : '',
  };
  if (data.category === 'input' || data.category === 'service') body.category = data.category;
  if (isRecord(data.details)) body.details = data.details;
  return body;
}

/**
 * Parse error response and throw appropriate error
 */
export function handleErrorResponse(response: Response, errorData?: ErrorResponse): never {
  const statusCode = response.status;
  const errorCode = errorData?.error || 'unknown_error';
  const message = errorData?.message || response.statusText || `HTTP ${statusCode}`;
  const details = errorData?.details;
  const category = errorData?.category;

  if (statusCode === 404) {
    if (errorCode === 'session_not_found') {
      throw new SessionNotFoundError(message, statusCode, errorCode, details, category);
    }
    throw new NotFoundError(message, statusCode, errorCode, details, category);
  } else if (statusCode === 400 && errorCode === 'invalid_reference') {
    throw new InvalidVideoUrlError(message, statusCode, errorCode, details, category);
  } else if (statusCode === 400 && TRANSCRIPT_ERROR_CODES.has(errorCode)) {
    throw new TranscriptUnavailableError(message, statusCode, errorCode, details, category);
  } else if (statusCode === 400 || statusCode === 422) {
    throw new ValidationError(message, statusCode, errorCode, details, category);
  } else if (statusCode >= 500) {
    throw new ServerError(message, statusCode, errorCode, details, category);
  } else {
    throw new APIError(message, statusCode, errorCode, details, category);
  }
}
