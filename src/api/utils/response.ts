/**
 * API Response Utilities
 *
 * Helper functions for creating consistent API responses. These utilities
 * ensure all endpoints return responses in the standardized format defined
 * in types.ts.
 *
 * Two main helpers are provided:
 * - success(): Creates a successful response with typed data
 * - error(): Creates an error response with code, message, and optional details
 *
 * @example
 * ```typescript
 * import { success, error } from '@/api/utils/response';
 *
 * router.get('/', (c) => success(c, { configured: true }));
 *
 * app.notFound((c) => error(c, ErrorCodes.NOT_FOUND, 'Route not found', 404));
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ErrorCode } from '../middleware/error-handler';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * Creates a standardized success response.
 *
 * Wraps the provided data in the ApiResponse structure and returns
 * it as a JSON response with the specified status code.
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const result = await engine.evaluate(word, sentence, false);
 *   return success(c, result);
 * });
 * ```
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helper
// ============================================================================

/**
 * Creates a standardized error response.
 *
 * @param code - One of {@link ErrorCodes}
 * @param message - Human-readable error message
 * @param details - Optional additional error context
 */
export function error(
  c: Context,
  code: ErrorCode,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
