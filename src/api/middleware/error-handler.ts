/**
 * Global Error Handler for the Tutor API
 *
 * All errors thrown by route handlers are transformed into a standardized
 * JSON response format:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... } // Optional additional context
 *   }
 * }
 * ```
 *
 * Hono catches handler errors before an outer middleware sees them, so the
 * handler is registered with `app.onError`.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { errorHandler, AppError } from '@/api/middleware/error-handler';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.put('/credentials', (c) => {
 *   throw new AppError('DATABASE_ERROR', 'Failed to store the API key', 500);
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 * These provide consistent error identification for clients.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom application error class for throwing controlled errors.
 *
 * The error handler turns these into responses with the given status code.
 *
 * @example
 * ```typescript
 * throw new AppError(
 *   'VALIDATION_ERROR',
 *   'Invalid request parameters',
 *   400,
 *   { field: 'word', reason: 'Too long' }
 * );
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  /** HTTP status code to return */
  public readonly statusCode: ContentfulStatusCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

/**
 * Formats an error into the standard API error response structure.
 *
 * Unexpected errors carry their message and stack outside production and a
 * generic message in production.
 */
export function formatErrorResponse(
  error: unknown,
  isProduction: boolean = process.env.NODE_ENV === 'production'
): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  // Handle AppError instances (controlled/expected errors)
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  // Handle standard Error instances (unexpected errors)
  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isProduction
            ? 'An unexpected error occurred. Please try again.'
            : error.message,
          ...(!isProduction && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Handle non-Error throws (rare but possible)
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(!isProduction && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the application error handler for `app.onError`.
 */
export function errorHandler(): ErrorHandler {
  return (err, c) => {
    console.error('[Error Handler]', err);

    const { response, statusCode } = formatErrorResponse(err);
    return c.json(response, statusCode);
  };
}
