/**
 * MockDictionarySource Tests
 */

import { describe, it, expect } from 'vitest';
import { MockDictionarySource } from './mock-dictionary-source';
import { adaptExternalEntry } from '../core/lexicon';

describe('MockDictionarySource', () => {
  it('returns a canned entry that mentions the word', async () => {
    const source = new MockDictionarySource({ latencyMs: 0 });

    await expect(source.fetch('tapestry')).resolves.toEqual({
      difficulty: 'Intermediate',
      meaning: 'A mock meaning for tapestry. (This is a demo fallback.)',
      partOfSpeech: 'adjective',
      examples: ['This is a mock example using tapestry.', 'Another mock sentence with tapestry.'],
      synonyms: ['sample', 'demo'],
    });
  });

  it('produces payloads the external entry adapter accepts', async () => {
    const payload = await new MockDictionarySource({ latencyMs: 0 }).fetch('tapestry');

    expect(adaptExternalEntry('tapestry', payload).success).toBe(true);
  });

  it('stops waiting when its signal aborts', async () => {
    const source = new MockDictionarySource({ latencyMs: 5000 });
    const controller = new AbortController();

    const pending = source.fetch('tapestry', controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});
