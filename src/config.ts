/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the vocabulary tutor. Values come
 * from environment variables and fall back to defaults suitable for local
 * development.
 *
 * Usage:
 *   import { getConfig } from './config';
 *
 *   const config = getConfig();
 *   console.log(config.server.port);
 *   console.log(config.externalSource.timeoutMs);
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().max(65535).default(3001),
    host: z.string().min(1).default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // External dictionary lookup
  externalSource: z.object({
    timeoutMs: z.number().int().positive().default(3000),
    mockLatencyMs: z.number().int().nonnegative().default(400),
  }),

  // SQLite file holding the stored API key
  database: z.object({
    path: z.string().min(1).default('./data/vocab-tutor.db'),
  }),

  // Request logging
  logging: z.object({
    requests: z.boolean().default(true),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable behind each configuration key, used in error reports.
 */
const ENV_VAR_NAMES: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'externalSource.timeoutMs': 'DICTIONARY_TIMEOUT_MS',
  'externalSource.mockLatencyMs': 'DICTIONARY_MOCK_LATENCY_MS',
  'database.path': 'DATABASE_PATH',
  'logging.requests': 'LOG_REQUESTS',
};

/**
 * Environment shape accepted by {@link loadConfig}. `process.env` satisfies it.
 */
export type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined when unset so the schema default applies, and NaN for
 * non-numeric input so the schema rejects it.
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
}

/**
 * Parse a boolean flag. "false", "0", "no" and "off" disable it.
 */
function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * Build the raw (unvalidated) configuration object from an environment.
 * Values keep whatever type parsing produced; the schema decides.
 */
function readEnvironment(env: Environment): Record<keyof Config, Record<string, unknown>> {
  return {
    server: {
      port: parseInteger(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    externalSource: {
      timeoutMs: parseInteger(env.DICTIONARY_TIMEOUT_MS),
      mockLatencyMs: parseInteger(env.DICTIONARY_MOCK_LATENCY_MS),
    },
    database: {
      path: env.DATABASE_PATH,
    },
    logging: {
      requests: parseFlag(env.LOG_REQUESTS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

function buildValidationError(invalidVars: { name: string; reason: string }[]): ConfigValidationError {
  const descriptions = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
  return new ConfigValidationError(`Invalid configuration: ${descriptions}`, invalidVars);
}

/**
 * Checks rules that span more than one value.
 *
 * A simulated dictionary latency at or above the lookup timeout means every
 * lookup times out.
 *
 * @throws {ConfigValidationError} If the configuration is inconsistent
 */
export function validateConfig(config: Config): void {
  const invalidVars: { name: string; reason: string }[] = [];

  if (config.externalSource.mockLatencyMs >= config.externalSource.timeoutMs) {
    invalidVars.push({
      name: 'DICTIONARY_MOCK_LATENCY_MS',
      reason: `must be below DICTIONARY_TIMEOUT_MS (${config.externalSource.timeoutMs})`,
    });
  }

  if (invalidVars.length > 0) {
    throw buildValidationError(invalidVars);
  }
}

/**
 * Loads, parses and validates configuration from an environment.
 *
 * @throws {ConfigValidationError} If a variable is malformed or the values are inconsistent
 *
 * @example
 * ```typescript
 * const config = loadConfig({ PORT: '8080' });
 * config.server.port; // 8080
 * ```
 */
export function loadConfig(env: Environment = process.env): Config {
  const result = configSchema.safeParse(readEnvironment(env));

  if (!result.success) {
    throw buildValidationError(
      result.error.issues.map((issue) => {
        const key = issue.path.join('.');
        return { name: ENV_VAR_NAMES[key] ?? key, reason: issue.message };
      })
    );
  }

  validateConfig(result.data);
  return result.data;
}

// =============================================================================
// Configuration Export
// =============================================================================

let cachedConfig: Config | undefined;

/**
 * The process-wide configuration, loaded from `process.env` on first use.
 */
export function getConfig(): Config {
  cachedConfig ??= loadConfig();
  return cachedConfig;
}
