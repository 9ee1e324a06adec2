/**
 * External Entry Adapter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { adaptExternalEntry } from './external-entry';

describe('adaptExternalEntry', () => {
  it('adapts a complete payload', () => {
    const result = adaptExternalEntry('serene', {
      difficulty: 'Advanced',
      meaning: 'Calm and peaceful.',
      partOfSpeech: 'adjective',
      examples: ['The lake was serene.'],
      synonyms: ['calm'],
    });

    expect(result).toEqual({
      success: true,
      entry: {
        difficulty: 'Advanced',
        meaning: 'Calm and peaceful.',
        partOfSpeech: 'adjective',
        examples: ['The lake was serene.'],
        synonyms: ['calm'],
      },
    });
  });

  it('matches difficulty and part of speech case-insensitively', () => {
    const result = adaptExternalEntry('stroll', {
      difficulty: 'beginner',
      meaning: 'To walk slowly.',
      partOfSpeech: 'Verb',
    });

    expect(result.success && result.entry.difficulty).toBe('Beginner');
    expect(result.success && result.entry.partOfSpeech).toBe('verb');
  });

  it('fills in missing fields', () => {
    const result = adaptExternalEntry('meticulous', { meaning: 'Very careful about detail.' });

    expect(result).toEqual({
      success: true,
      entry: {
        difficulty: 'Advanced',
        meaning: 'Very careful about detail.',
        partOfSpeech: 'other',
        examples: [],
        synonyms: [],
      },
    });
  });

  it('infers difficulty when the source uses an unknown label', () => {
    const result = adaptExternalEntry('cat', { difficulty: 'C2', meaning: 'A small animal.' });

    expect(result.success && result.entry.difficulty).toBe('Beginner');
  });

  it('rejects a payload without a meaning', () => {
    expect(adaptExternalEntry('word', { meaning: '   ' }).success).toBe(false);
    expect(adaptExternalEntry('word', { examples: [] }).success).toBe(false);
    expect(adaptExternalEntry('word', 'not an object').success).toBe(false);
  });
});
