/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp({ engine, credentials }, { environment: 'development' });
 * ```
 */

// Server factory and utilities
export { createApp, startServer, findAvailablePort, type AppOptions } from './server';

// Middleware
export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  validate,
} from './middleware';

// Routes
export { createApiRouter, type ApiDependencies, type ApiInfo } from './routes';

// Types
export * from './types';
