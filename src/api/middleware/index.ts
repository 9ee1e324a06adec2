/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * import { errorHandler, loggerMiddleware } from '@/api/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * ```
 */

// Error handling
export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  type ErrorCode,
} from './error-handler';

// Request logging
export {
  loggerMiddleware,
  formatResponseTime,
  formatRequestLine,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  type RequestRecord,
} from './logger';

// Body validation
export { validate, type ValidatedBodyEnv } from './validate';
