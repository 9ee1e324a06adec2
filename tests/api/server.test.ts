/**
 * Server Wiring Tests
 *
 * Health, API info, 404 handling and error formatting.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createApp } from '../../src/api/server';
import { formatRequestLine, loggerMiddleware } from '../../src/api/middleware';
import { MemoryCredentialStore } from '../../src/storage';
import { createTestContext, createTestEngine } from '../setup';
import { readJson } from '../helpers';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GET /health', () => {
  it('reports status, environment and version', async () => {
    const { app } = createTestContext();

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      success: true,
      data: {
        status: 'ok',
        timestamp: expect.any(String),
        environment: 'test',
        version: '0.1.0',
      },
    });
  });
});

describe('GET /api', () => {
  it('lists the endpoints', async () => {
    const { app } = createTestContext();

    const res = await app.request('/api');

    expect(await readJson(res)).toEqual({
      success: true,
      data: {
        name: 'Vocabulary Usage Tutor API',
        version: '0.1.0',
        endpoints: [
          { path: '/api/evaluate', description: 'Evaluate how a word is used in a sentence' },
          { path: '/api/credentials', description: 'Manage the dictionary API key' },
        ],
      },
    });
  });
});

describe('unmatched routes', () => {
  it('return a JSON 404', async () => {
    const { app } = createTestContext();

    const res = await app.request('/api/unknown');

    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /api/unknown not found' },
    });
  });
});

describe('error handling', () => {
  it('formats a failing credential write as DATABASE_ERROR', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const credentials = new MemoryCredentialStore();
    vi.spyOn(credentials, 'set').mockReturnValue(false);
    const app = createApp(
      { engine: createTestEngine(), credentials },
      { environment: 'test', logRequests: false }
    );

    const res = await app.request('/api/credentials', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ apiKey: 'test-secret' }),
    });

    expect(res.status).toBe(500);
    expect(await readJson(res)).toEqual({
      success: false,
      error: { code: 'DATABASE_ERROR', message: 'Failed to store the API key' },
    });
  });

  it('reports unexpected engine failures as INTERNAL_ERROR', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const engine = createTestEngine();
    vi.spyOn(engine, 'evaluate').mockRejectedValue(new Error('boom'));
    const app = createApp(
      { engine, credentials: new MemoryCredentialStore() },
      { environment: 'test', logRequests: false }
    );

    const res = await app.request('/api/evaluate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ word: 'happy', sentence: 'I am happy.' }),
    });

    expect(res.status).toBe(500);
    expect(await readJson(res)).toMatchObject({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'boom' },
    });
  });
});

describe('request logging', () => {
  function appWithLogger(lines: string[]) {
    return createApp(
      { engine: createTestEngine(), credentials: new MemoryCredentialStore() },
      {
        environment: 'test',
        requestLogger: loggerMiddleware({ colorize: false, write: (line) => lines.push(line) }),
      }
    );
  }

  it('writes one plain line per evaluation request', async () => {
    const lines: string[] = [];
    const app = appWithLogger(lines);

    const res = await app.request('/api/evaluate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ word: 'happy', sentence: 'I am happy.' }),
    });

    expect(res.status).toBe(200);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] POST \/api\/evaluate 200 - \d+ms$/);
  });

  it('skips health checks', async () => {
    const lines: string[] = [];
    const app = appWithLogger(lines);

    await app.request('/health');
    await app.request('/api/unknown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] GET \/api\/unknown 404 - \d+ms$/);
  });

  it('falls back to console output when no logger is injected', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const app = createApp(
      { engine: createTestEngine(), credentials: new MemoryCredentialStore() },
      { environment: 'test' }
    );

    await app.request('/health');
    expect(log).not.toHaveBeenCalled();

    await app.request('/api/credentials');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toContain('/api/credentials');
  });
});

describe('formatRequestLine', () => {
  it('prints seconds for slow requests', () => {
    expect(
      formatRequestLine({ method: 'PUT', path: '/api/credentials', status: 400, durationMs: 1500 }, false)
    ).toBe('[API] PUT /api/credentials 400 - 1.50s');
  });

  it('colors the status and dims the duration', () => {
    expect(
      formatRequestLine({ method: 'GET', path: '/api', status: 200, durationMs: 5 }, true)
    ).toBe('[API] GET /api \x1b[32m200\x1b[0m - \x1b[2m5ms\x1b[0m');
  });

  it('colors server errors red', () => {
    expect(
      formatRequestLine({ method: 'POST', path: '/api/evaluate', status: 500, durationMs: 12 }, true)
    ).toBe('[API] POST /api/evaluate \x1b[31m500\x1b[0m - \x1b[2m12ms\x1b[0m');
  });
});
