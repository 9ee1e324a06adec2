/**
 * API Response and Request Types
 *
 * Standardized response type definitions for the tutor API.
 * All API endpoints return responses conforming to these types to ensure
 * consistent client-side handling.
 *
 * Two response types are defined:
 * 1. ApiResponse<T> - For successful responses with typed data
 * 2. ApiErrorResponse - For error responses with structured error info
 *
 * This type system enables:
 * - TypeScript type inference for response data
 * - Consistent error handling across all endpoints
 *
 * @example
 * ```typescript
 * // Success response
 * const response: ApiResponse<{ configured: boolean }> = {
 *   success: true,
 *   data: { configured: true }
 * };
 *
 * // Error response
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: {
 *     code: 'VALIDATION_ERROR',
 *     message: 'Invalid request body',
 *   }
 * };
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Success Response Types
// ============================================================================

/**
 * Standard success response wrapper for API endpoints.
 *
 * All successful API responses wrap their data in this structure,
 * allowing clients to reliably check the `success` field and access
 * strongly-typed data.
 *
 * @typeParam T - The type of data being returned
 *
 * @example
 * ```typescript
 * // Handler returning a typed response
 * router.get('/', (c) => {
 *   const body: ApiResponse<{ configured: boolean }> = { success: true, data: { configured: false } };
 *   return c.json(body);
 * });
 * ```
 */
export interface ApiResponse<T> {
  /** Indicates the request was successful */
  success: true;
  /** The response payload with type T */
  data: T;
}

// ============================================================================
// Error Response Types
// ============================================================================

/**
 * Detailed error information structure.
 *
 * Contains all information needed for clients to understand and handle
 * errors appropriately, from displaying user-friendly messages to
 * highlighting specific validation failures.
 */
export interface ApiError {
  /**
   * Machine-readable error code for programmatic handling.
   * Examples: 'VALIDATION_ERROR', 'NOT_FOUND', 'UNAUTHORIZED'
   */
  code: string;

  /**
   * Human-readable error message suitable for display.
   * Should be clear and actionable when possible.
   */
  message: string;

  /**
   * Additional error context (optional).
   * For validation errors, this contains field-level error details.
   * For other errors, may contain debugging information.
   */
  details?: unknown;
}

/**
 * Standard error response wrapper for API endpoints.
 *
 * All error responses from the API conform to this structure,
 * enabling consistent error handling on the client side.
 *
 * @example
 * ```typescript
 * // Client-side error handling
 * const response = await fetch('/api/evaluate', { method: 'POST', body });
 * const data = await response.json();
 *
 * if (!data.success) {
 *   // TypeScript knows this is ApiErrorResponse
 *   console.error(`Error ${data.error.code}: ${data.error.message}`);
 *   if (data.error.details) {
 *     // Handle validation errors or additional context
 *   }
 * }
 * ```
 */
export interface ApiErrorResponse {
  /** Indicates the request failed */
  success: false;
  /** Error information */
  error: ApiError;
}

// ============================================================================
// Validation Detail Types
// ============================================================================

/**
 * Structure for individual validation error details.
 *
 * When a Zod validation fails, errors are transformed into this
 * format to provide clear, field-specific error information.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g., 'user.email') */
  path: string;
  /** Human-readable description of the validation failure */
  message: string;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

/**
 * Schema for POST /api/evaluate.
 *
 * An empty or blank word is accepted: the tutor answers it with the
 * "no word provided" result. When `useExternalSource` is omitted the route
 * decides from the credential store.
 *
 * @example
 * ```typescript
 * evaluateRequestSchema.parse({ word: 'resilient', sentence: 'I am resilient.' });
 * ```
 */
export const evaluateRequestSchema = z.object({
  word: z.string().max(100, 'Word must be 100 characters or less'),
  sentence: z.string().max(2000, 'Sentence must be 2000 characters or less'),
  useExternalSource: z.boolean().optional(),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;

/**
 * Schema for PUT /api/credentials. Surrounding whitespace is trimmed.
 */
export const saveCredentialSchema = z.object({
  apiKey: z.string().trim().min(1, 'API key is required').max(512),
});

export type SaveCredentialRequest = z.infer<typeof saveCredentialSchema>;
