/**
 * Health Check Route
 *
 * Lightweight liveness endpoint for monitoring. It does not touch the
 * credential database or the dictionary source.
 *
 * @example
 * ```bash
 * curl http://localhost:3001/health
 *
 * # {
 * #   "success": true,
 * #   "data": {
 * #     "status": "ok",
 * #     "timestamp": "2024-01-15T10:30:00.000Z",
 * #     "environment": "development",
 * #     "version": "0.1.0"
 * #   }
 * # }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Health check response data structure.
 */
export interface HealthCheckData {
  /** Server status indicator ('ok' when healthy) */
  status: 'ok';

  /** ISO 8601 timestamp of when the check was performed */
  timestamp: string;

  /** Current running environment (development, production, test) */
  environment: string;

  /** Application version */
  version: string;
}

/**
 * Application version, kept in step with package.json.
 */
export const APP_VERSION = '0.1.0';

// ============================================================================
// Route Definition
// ============================================================================

/**
 * Creates the health check router.
 *
 * @param environment - Reported as `data.environment`
 *
 * @example
 * ```typescript
 * app.route('/health', healthRoutes('production'));
 * ```
 */
export function healthRoutes(environment: string): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
      version: APP_VERSION,
    };

    return success(c, healthData);
  });

  return router;
}
