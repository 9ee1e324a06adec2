/**
 * Usage Classifier Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { locateWord } from '../tokenizer';
import { classifyUsage, isNaturalUsage, precedingWord } from './usage-classifier';

/**
 * Locates `word` in `sentence`, failing the test if it is missing.
 */
function spanOf(sentence: string, word: string) {
  const span = locateWord(sentence, word);
  if (!span) {
    throw new Error(`"${word}" not found in "${sentence}"`);
  }
  return span;
}

describe('precedingWord', () => {
  it('returns the lower-cased word before the token', () => {
    const sentence = 'Honestly I AM resilient.';
    expect(precedingWord(sentence, spanOf(sentence, 'resilient'))).toBe('am');
  });

  it('returns undefined when the token opens the sentence', () => {
    const sentence = '  Resilient is good.';
    expect(precedingWord(sentence, spanOf(sentence, 'resilient'))).toBeUndefined();
  });

  it('keeps punctuation attached to the previous word', () => {
    const sentence = 'Well, happy days.';
    expect(precedingWord(sentence, spanOf(sentence, 'happy'))).toBe('well,');
  });
});

describe('isNaturalUsage', () => {
  it.each([
    ['I am resilient.', 'resilient'],
    ['They were resilient.', 'resilient'],
    ['You look happy.', 'happy'],
    ['We feel happy.', 'happy'],
  ])('accepts a linking verb before an adjective: %s', (sentence, word) => {
    expect(isNaturalUsage(sentence, spanOf(sentence, word), 'adjective')).toBe(true);
  });

  it('rejects an adjective after a non-linking word', () => {
    const sentence = 'Very resilient people.';
    expect(isNaturalUsage(sentence, spanOf(sentence, 'resilient'), 'adjective')).toBe(false);
  });

  it.each([
    ['I improve daily.', 'improve'],
    ['She improve fast.', 'improve'],
    ['It improve slowly.', 'improve'],
  ])('accepts a pronoun before a verb: %s', (sentence, word) => {
    expect(isNaturalUsage(sentence, spanOf(sentence, word), 'verb')).toBe(true);
  });

  it('rejects a verb after a noun', () => {
    const sentence = 'Students improve daily.';
    expect(isNaturalUsage(sentence, spanOf(sentence, 'improve'), 'verb')).toBe(false);
  });

  it.each([
    ['This is a banana.', 'banana'],
    ['Take their banana.', 'banana'],
    ['The banana is ripe.', 'banana'],
  ])('accepts a determiner before a noun: %s', (sentence, word) => {
    expect(isNaturalUsage(sentence, spanOf(sentence, word), 'noun')).toBe(true);
  });

  it('rejects a noun after a verb', () => {
    const sentence = 'I ate banana.';
    expect(isNaturalUsage(sentence, spanOf(sentence, 'banana'), 'noun')).toBe(false);
  });

  it('requires a preceding word for constrained roles', () => {
    const sentence = 'Banana split.';
    const span = spanOf(sentence, 'banana');

    expect(isNaturalUsage(sentence, span, 'adjective')).toBe(false);
    expect(isNaturalUsage(sentence, span, 'verb')).toBe(false);
    expect(isNaturalUsage(sentence, span, 'noun')).toBe(false);
    expect(isNaturalUsage(sentence, span, 'adverb')).toBe(true);
    expect(isNaturalUsage(sentence, span, 'other')).toBe(true);
  });

  it('places no constraint on adverbs and other roles', () => {
    const sentence = 'Apples quickly fell.';
    const span = spanOf(sentence, 'quickly');

    expect(isNaturalUsage(sentence, span, 'adverb')).toBe(true);
    expect(isNaturalUsage(sentence, span, 'other')).toBe(true);
  });
});

describe('classifyUsage', () => {
  it('reports a role match with natural usage', () => {
    const sentence = 'I am resilient when I feel sad.';

    expect(classifyUsage(sentence, spanOf(sentence, 'resilient'), 'adjective', 'adjective')).toEqual({
      matchesExpectedRole: true,
      natural: true,
    });
  });

  it('reports a role match with unnatural usage', () => {
    const sentence = 'Resilient is good.';

    expect(classifyUsage(sentence, spanOf(sentence, 'resilient'), 'adjective', 'adjective')).toEqual({
      matchesExpectedRole: true,
      natural: false,
    });
  });

  it('judges naturalness by the actual role, not the expected one', () => {
    const sentence = 'I saw the improve.';

    // used as a noun after "the": natural for a noun, but not the expected verb
    expect(classifyUsage(sentence, spanOf(sentence, 'improve'), 'noun', 'verb')).toEqual({
      matchesExpectedRole: false,
      natural: true,
    });
  });
});
