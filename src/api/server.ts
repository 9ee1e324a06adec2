/**
 * Tutor API Server
 *
 * Hono application for the vocabulary tutor, served on Node through
 * @hono/node-server.
 *
 * Features:
 * - Automatic port discovery (finds available port if preferred is in use)
 * - Request logging with response times
 * - Consistent JSON error responses
 * - Health check endpoint
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT - Preferred port (default: 3001)
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   NODE_ENV - Environment mode (development/production/test)
 *   LOG_REQUESTS - Set to "false" to silence request logging
 *
 * @example
 * ```bash
 * PORT=8080 npm run server
 * ```
 */

import { createServer } from 'node:net';
import { Hono, type MiddlewareHandler } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { getConfig, type Config } from '../config';
import { createTutorServices } from '../bootstrap';
import { isEntryPoint } from '../utils/entry-point';
import { errorHandler, ErrorCodes, loggerMiddleware } from './middleware';
import { createApiRouter, healthRoutes, type ApiDependencies } from './routes';
import { error } from './utils/response';

// ============================================================================
// Port Availability Check
// ============================================================================

/** Highest port tried by {@link findAvailablePort}. */
const MAX_PORT = 3100;

/**
 * Finds an available port starting from the preferred port.
 *
 * Binds a temporary server to each candidate and moves on to the next port
 * when binding fails.
 *
 * @throws Error if no available port is found up to `maxPort`
 *
 * @example
 * ```typescript
 * const port = await findAvailablePort(3001);
 * ```
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = Math.max(MAX_PORT, preferredPort)
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    if (await isPortFree(port)) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

function isPortFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = createServer();
    probe.once('error', () => resolve(false));
    probe.listen(port, () => {
      probe.close(() => resolve(true));
    });
  });
}

// ============================================================================
// Hono Application Setup
// ============================================================================

/**
 * Options for {@link createApp}.
 */
export interface AppOptions {
  /** Reported by GET /health */
  environment: string;
  /** Mount the request logger (default true) */
  logRequests?: boolean;
  /** Logger mounted in place of the default one when logging is on */
  requestLogger?: MiddlewareHandler;
}

/**
 * Creates and configures the Hono application.
 *
 * Errors thrown by any route are formatted by the error handler; unmatched
 * routes get a JSON 404.
 *
 * @example
 * ```typescript
 * const app = createApp(
 *   { engine: new TutorEngine(), credentials: new MemoryCredentialStore() },
 *   { environment: 'test', logRequests: false }
 * );
 * const res = await app.request('/health');
 * ```
 */
export function createApp(deps: ApiDependencies, options: AppOptions): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (options.logRequests ?? true) {
    app.use('*', options.requestLogger ?? loggerMiddleware());
  }

  app.route('/health', healthRoutes(options.environment));
  app.route('/api', createApiRouter(deps));

  app.notFound((c) =>
    error(c, ErrorCodes.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404)
  );

  return app;
}

// ============================================================================
// Server Startup
// ============================================================================

/**
 * Starts the HTTP server on an available port.
 *
 * Resolves once the server is listening. SIGINT and SIGTERM close it.
 */
export async function startServer(config: Config): Promise<ServerType> {
  const port = await findAvailablePort(config.server.port);
  const app = createApp(createTutorServices(config), {
    environment: config.server.nodeEnv,
    logRequests: config.logging.requests,
  });

  const server = await new Promise<ServerType>((resolve) => {
    const started = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
      console.log('');
      console.log(`[Server] Vocabulary tutor listening on http://localhost:${info.port}`);
      console.log(`[Server] Environment: ${config.server.nodeEnv}`);
      console.log(`[Server]   Health:    http://localhost:${info.port}/health`);
      console.log(`[Server]   Evaluate:  POST http://localhost:${info.port}/api/evaluate`);
      console.log('');
      resolve(started);
    });
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

// Start the server when this file is run directly
if (isEntryPoint(import.meta.url)) {
  startServer(getConfig()).catch((error: unknown) => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
}
