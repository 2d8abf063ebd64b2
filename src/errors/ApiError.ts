/**
 * API Error Class Hierarchy
 *
 * Each error type maps to an HTTP status code and a machine-readable code.
 *
 * ## Usage
 *
 * ```typescript
 * // In services:
 * throw new CatalogNotFoundError('fr', catalogPath);
 *
 * // In error middleware:
 * if (error instanceof ApiError) {
 *   res.status(error.statusCode).json(error.toResponse());
 * }
 * ```
 */

/**
 * Standard API error response structure
 */
export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

export const ErrorCodes = {
  // Not found errors (404)
  NOT_FOUND: 'NOT_FOUND',

  // Internal errors (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CATALOG_NOT_FOUND: 'CATALOG_NOT_FOUND',
  CATALOG_LOAD_FAILED: 'CATALOG_LOAD_FAILED',
  CATALOG_INVALID: 'CATALOG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base API Error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(requestId?: string): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      requestId,
    };
  }
}

// =============================================================================
// Not Found Errors (404)
// =============================================================================

export class NotFoundError extends ApiError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode = ErrorCodes.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, 404, code, details);
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    isOperational: boolean = false
  ) {
    super(message, 500, code, details, isOperational);
  }
}

export class ConfigurationError extends InternalError {
  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, issues.length > 0 ? { issues } : undefined);
  }
}

/**
 * No catalog file exists for the locale. The only catalog failure the
 * request middleware treats as an expected condition.
 */
export class CatalogNotFoundError extends InternalError {
  constructor(locale: string, path: string) {
    super(
      `No translation catalog found for locale '${locale}'`,
      ErrorCodes.CATALOG_NOT_FOUND,
      { locale, path },
      true
    );
  }
}

/**
 * The catalog file exists but is not a JSON object
 */
export class CatalogFormatError extends InternalError {
  constructor(locale: string, reason: string) {
    super(
      `Invalid translation catalog for locale '${locale}': ${reason}`,
      ErrorCodes.CATALOG_INVALID,
      { locale }
    );
  }
}

export class CatalogLoadError extends InternalError {
  constructor(locale: string, reason: string) {
    super(
      `Could not read translation catalog for locale '${locale}': ${reason}`,
      ErrorCodes.CATALOG_LOAD_FAILED,
      { locale }
    );
  }
}
