/**
 * Request Logger Middleware
 *
 * One line per finished request:
 * ```
 * [API] POST /api/evaluate 200 - 15ms
 * [API] PUT /api/credentials 400 - 2ms
 * ```
 *
 * Health checks are skipped so that polling does not drown out evaluations.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  /** Path prefixes that are never logged */
  skipPaths: readonly string[];
  /** Color the status and duration (terminal output) */
  colorize: boolean;
  /** Sink for finished lines */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const LOG_PREFIX = '[API]';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  if (status >= 300) return '\x1b[36m';
  return '\x1b[32m';
}

/**
 * Milliseconds under one second, seconds with two decimals above.
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/** What the logger knows about a finished request. */
export interface RequestRecord {
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

export function formatRequestLine(record: RequestRecord, colorize: boolean): string {
  const duration = formatResponseTime(record.durationMs);
  if (!colorize) {
    return `${LOG_PREFIX} ${record.method} ${record.path} ${record.status} - ${duration}`;
  }
  const status = `${statusColor(record.status)}${record.status}${RESET}`;
  return `${LOG_PREFIX} ${record.method} ${record.path} ${status} - ${DIM}${duration}${RESET}`;
}

/**
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: false, write: (line) => lines.push(line) }));
 * ```
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const { skipPaths, colorize, write }: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startedAt = performance.now();
    await next();

    write(
      formatRequestLine(
        {
          method: c.req.method,
          path,
          status: c.res.status,
          durationMs: Math.round(performance.now() - startedAt),
        },
        colorize
      )
    );
  };
}
