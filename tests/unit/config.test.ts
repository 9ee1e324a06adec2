/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig, ConfigValidationError, type Config } from '../../src/config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { port: 3001, host: '0.0.0.0', nodeEnv: 'development' },
      externalSource: { timeoutMs: 3000, mockLatencyMs: 400 },
      database: { path: './data/vocab-tutor.db' },
      logging: { requests: true },
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      DICTIONARY_TIMEOUT_MS: '1500',
      DICTIONARY_MOCK_LATENCY_MS: '0',
      DATABASE_PATH: '/tmp/tutor.db',
      LOG_REQUESTS: 'false',
    });

    expect(config.server).toEqual({ port: 8080, host: '127.0.0.1', nodeEnv: 'production' });
    expect(config.externalSource).toEqual({ timeoutMs: 1500, mockLatencyMs: 0 });
    expect(config.database.path).toBe('/tmp/tutor.db');
    expect(config.logging.requests).toBe(false);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ' }).server.port).toBe(3001);
  });

  it('names the offending variable when a value is malformed', () => {
    try {
      loadConfig({ PORT: 'eighty' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidVars.map((v) => v.name)).toEqual(['PORT']);
      }
    }
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(ConfigValidationError);
  });

  it('rejects a mock latency that reaches the timeout', () => {
    expect(() =>
      loadConfig({ DICTIONARY_TIMEOUT_MS: '500', DICTIONARY_MOCK_LATENCY_MS: '500' })
    ).toThrow(/DICTIONARY_MOCK_LATENCY_MS/);
  });
});

describe('validateConfig', () => {
  const base: Config = loadConfig({});

  it('accepts the defaults', () => {
    expect(() => validateConfig(base)).not.toThrow();
  });

  it('reports the latency variable', () => {
    const config: Config = {
      ...base,
      externalSource: { timeoutMs: 100, mockLatencyMs: 200 },
    };

    try {
      validateConfig(config);
      expect.unreachable('validateConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidVars).toEqual([
          { name: 'DICTIONARY_MOCK_LATENCY_MS', reason: 'must be below DICTIONARY_TIMEOUT_MS (100)' },
        ]);
      }
    }
  });
});
