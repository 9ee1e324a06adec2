/**
 * Evaluation API Tests
 *
 * Drives POST /api/evaluate through the Hono app with an in-memory
 * credential database and the zero-latency mock dictionary.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContext, sendJson, type TestContext } from '../setup';
import { readJson } from '../helpers';

describe('POST /api/evaluate', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('returns a Correct verdict for natural usage of a curated word', async () => {
    const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
      word: 'resilient',
      sentence: 'I am resilient when I feel sad.',
      useExternalSource: false,
    });

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      success: true,
      data: {
        wordAnalysis: {
          difficulty: 'Intermediate',
          meaning:
            'Able to recover quickly from problems or strong emotions; not easily discouraged.',
          examples: [
            'After losing her job, Maria stayed resilient and found a new role within months.',
            'Children can be very resilient after moving to a new school.',
          ],
          synonyms: ['tough', 'strong', 'adaptable'],
        },
        sentenceFeedback: {
          status: 'Correct',
          explanation: 'Great! You used “resilient” correctly in the sentence.',
          correctedSentence: '',
        },
      },
    });
  });

  it('suggests a simple sentence when the word opens the sentence', async () => {
    const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
      word: 'resilient',
      sentence: 'Resilient is good.',
      useExternalSource: false,
    });

    expect(await readJson(res)).toMatchObject({
      data: {
        sentenceFeedback: {
          status: 'Mostly correct',
          correctedSentence: 'I am resilient.',
        },
      },
    });
  });

  it('marks a missing word Incorrect', async () => {
    const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
      word: 'banana',
      sentence: 'I like apples.',
      useExternalSource: false,
    });

    expect(await readJson(res)).toMatchObject({
      data: {
        wordAnalysis: { difficulty: 'Intermediate', synonyms: [] },
        sentenceFeedback: { status: 'Incorrect', correctedSentence: 'I am banana.' },
      },
    });
  });

  it('answers an empty word with the fixed result', async () => {
    const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
      word: '   ',
      sentence: 'Anything at all.',
    });

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      success: true,
      data: {
        wordAnalysis: {
          difficulty: 'Beginner',
          meaning: 'No word provided.',
          examples: [],
          synonyms: [],
        },
        sentenceFeedback: {
          status: 'Incorrect',
          explanation: 'You did not provide a word to analyse.',
          correctedSentence: '',
        },
      },
    });
  });

  describe('external source selection', () => {
    it('uses the heuristic when no key is stored and the flag is omitted', async () => {
      const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
        word: 'tapestry',
        sentence: 'The tapestry hung on the wall.',
      });

      expect(await readJson(res)).toMatchObject({
        data: {
          wordAnalysis: {
            meaning:
              'Tapestry — a word that describes a person, place, thing, or feeling. (Simple explanation)',
          },
        },
      });
    });

    it('uses the external source when a key is stored and the flag is omitted', async () => {
      ctx.credentials.set('test-secret');

      const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
        word: 'tapestry',
        sentence: 'The tapestry hung on the wall.',
      });

      expect(await readJson(res)).toMatchObject({
        data: {
          wordAnalysis: {
            meaning: 'A mock meaning for tapestry. (This is a demo fallback.)',
            synonyms: ['sample', 'demo'],
          },
        },
      });
    });

    it('honours an explicit false even when a key is stored', async () => {
      ctx.credentials.set('test-secret');

      const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
        word: 'tapestry',
        sentence: 'The tapestry hung on the wall.',
        useExternalSource: false,
      });

      expect(await readJson(res)).toMatchObject({
        data: { wordAnalysis: { synonyms: [] } },
      });
    });
  });

  describe('validation', () => {
    it('rejects a body without a sentence', async () => {
      const res = await sendJson(ctx.app, 'POST', '/api/evaluate', { word: 'happy' });

      expect(res.status).toBe(400);
      expect(await readJson(res)).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request body',
          details: [{ path: 'sentence', message: 'Required' }],
        },
      });
    });

    it('rejects a non-boolean useExternalSource', async () => {
      const res = await sendJson(ctx.app, 'POST', '/api/evaluate', {
        word: 'happy',
        sentence: 'I am happy.',
        useExternalSource: 'yes',
      });

      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({
        error: { code: 'VALIDATION_ERROR' },
      });
    });

    it('rejects malformed JSON', async () => {
      const res = await ctx.app.request('/api/evaluate', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"word": ',
      });

      expect(res.status).toBe(400);
      expect(await readJson(res)).toEqual({
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body must be valid JSON' },
      });
    });
  });
});
