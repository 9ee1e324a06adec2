/**
 * API Routes Aggregator
 *
 * Combines the route modules into the router mounted under /api.
 *
 * Route Structure:
 * - /health - Health check endpoint (mounted at root, not under /api)
 * - /api - API root with version info
 * - /api/evaluate - Sentence evaluation
 * - /api/credentials - Dictionary API key management
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes('development'));
 * app.route('/api', createApiRouter({ engine, credentials }));
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { evaluateRoutes, type EvaluateRouteDependencies } from './evaluate';
import { credentialsRoutes } from './credentials';
import { APP_VERSION } from './health';

// Re-export individual route modules for direct access
export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { evaluateRoutes, type EvaluateRouteDependencies } from './evaluate';
export { credentialsRoutes, type CredentialStatus } from './credentials';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * API information returned by the root endpoint.
 */
export interface ApiInfo {
  /** Human-readable API name */
  name: string;

  /** Current API version */
  version: string;

  /** Available top-level endpoints */
  endpoints: {
    /** Endpoint path */
    path: string;
    /** Brief description */
    description: string;
  }[];
}

/**
 * Collaborators shared by all API routes.
 */
export type ApiDependencies = EvaluateRouteDependencies;

// ============================================================================
// API Router Factory
// ============================================================================

/**
 * Creates the main API router with all routes mounted.
 */
export function createApiRouter(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const info: ApiInfo = {
      name: 'Vocabulary Usage Tutor API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/evaluate', description: 'Evaluate how a word is used in a sentence' },
        { path: '/api/credentials', description: 'Manage the dictionary API key' },
      ],
    };

    return success(c, info);
  });

  router.route('/evaluate', evaluateRoutes(deps));
  router.route('/credentials', credentialsRoutes(deps.credentials));

  return router;
}
