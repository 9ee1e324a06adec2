/**
 * Zod Validation Middleware
 *
 * Validates the JSON request body against a Zod schema and either stores
 * the parsed value for the route handler or answers with a structured 400.
 * The parsed body is typed through the middleware's Hono env, so handlers
 * read it with `c.get('validatedBody')` without a cast.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { validate } from '@/api/middleware/validate';
 * import { evaluateRequestSchema } from '@/api/types';
 *
 * const router = new Hono();
 *
 * router.post('/', validate(evaluateRequestSchema), async (c) => {
 *   const { word, sentence } = c.get('validatedBody');
 *   return success(c, await engine.evaluate(word, sentence, false));
 * });
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import type { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { error } from '../utils/response';
import { ErrorCodes } from './error-handler';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Hono env contributed by {@link validate}: the parsed body under
 * `validatedBody`.
 */
export interface ValidatedBodyEnv<T extends z.ZodTypeAny> {
  Variables: {
    validatedBody: z.output<T>;
  };
}

// ============================================================================
// Validation Middleware
// ============================================================================

/**
 * Creates a validation middleware for the given Zod schema.
 *
 * This middleware:
 * 1. Parses the request body as JSON (400 INVALID_JSON when it is not JSON)
 * 2. Validates it against the provided Zod schema (400 VALIDATION_ERROR on failure)
 * 3. Stores the parsed value in context and calls next()
 *
 * @example
 * ```typescript
 * // POST /api/evaluate with body: { word: 42 }
 * // Returns 400:
 * // {
 * //   "success": false,
 * //   "error": {
 * //     "code": "VALIDATION_ERROR",
 * //     "message": "Invalid request body",
 * //     "details": [
 * //       { "path": "word", "message": "Expected string, received number" },
 * //       { "path": "sentence", "message": "Required" }
 * //     ]
 * //   }
 * // }
 * ```
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<ValidatedBodyEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      // Malformed or missing JSON body
      if (err instanceof SyntaxError) {
        return error(c, ErrorCodes.INVALID_JSON, 'Request body must be valid JSON');
      }
      throw err;
    }

    const result = schema.safeParse(body);

    if (!result.success) {
      // Transform Zod errors into our standard error detail format
      const details: ValidationErrorDetail[] = result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));

      return error(c, ErrorCodes.VALIDATION_ERROR, 'Invalid request body', 400, details);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}
