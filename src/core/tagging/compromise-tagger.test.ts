/**
 * CompromiseTagger Tests
 *
 * Runs the real compromise library on short, unambiguous sentences.
 */

import { describe, it, expect } from 'vitest';
import { CompromiseTagger, mapCompromiseTags } from './compromise-tagger';

describe('mapCompromiseTags', () => {
  it('maps top-level compromise tags to parts of speech', () => {
    expect(mapCompromiseTags(['Noun', 'Singular'])).toBe('noun');
    expect(mapCompromiseTags(['Verb', 'PresentTense'])).toBe('verb');
    expect(mapCompromiseTags(['Adjective'])).toBe('adjective');
    expect(mapCompromiseTags(['Adverb'])).toBe('adverb');
  });

  it('prefers the more specific role when several are present', () => {
    expect(mapCompromiseTags(['Noun', 'Adjective'])).toBe('adjective');
    expect(mapCompromiseTags(['Verb', 'Adverb'])).toBe('adverb');
  });

  it('reads pronouns as plain words rather than nouns', () => {
    expect(mapCompromiseTags(['Noun', 'Pronoun'])).toBe('other');
  });

  it('maps unknown tag sets to other', () => {
    expect(mapCompromiseTags(['Preposition'])).toBe('other');
    expect(mapCompromiseTags([])).toBe('other');
  });
});

describe('CompromiseTagger', () => {
  const tagger = new CompromiseTagger();

  it('tags an adverb', () => {
    expect(tagger.tag('She runs quickly.', { start: 9, end: 16 })).toBe('adverb');
  });

  it('tags a noun', () => {
    expect(tagger.tag('The dog barked.', { start: 4, end: 7 })).toBe('noun');
  });

  it('tags an adjective', () => {
    expect(tagger.tag('I feel happy today.', { start: 7, end: 12 })).toBe('adjective');
  });

  it('tags a verb', () => {
    expect(tagger.tag('We improve every day.', { start: 3, end: 10 })).toBe('verb');
  });

  it('tags a subject pronoun as other', () => {
    expect(tagger.tag('They are here.', { start: 0, end: 4 })).toBe('other');
  });

  it('returns undefined when no term covers the span', () => {
    expect(tagger.tag('Hello there.', { start: 40, end: 45 })).toBeUndefined();
  });
});
