/**
 * Heuristic Entry Builder
 *
 * Last-resort producer for words that are neither in the local dictionary
 * nor available from the external source. Everything is inferred from the
 * spelling of the word:
 *
 * - part of speech from its ending (suffix rules below)
 * - difficulty from its length
 * - meaning and examples from templates keyed by the inferred role
 *
 * The builder is total: any non-empty word yields a valid WordEntry.
 */

import type { Difficulty, PartOfSpeech, WordEntry } from '../models';

/**
 * Suffix rules, checked in order. The first matching group decides.
 */
const SUFFIX_RULES: ReadonlyArray<[suffixes: readonly string[], pos: PartOfSpeech]> = [
  [['ly'], 'adverb'],
  [['ing', 'ed'], 'verb'],
  [['ion', 'ment', 'ness'], 'noun'],
  [['able', 'ous', 'ful', 'less', 'ive', 'al'], 'adjective'],
];

/** Role assumed when no suffix rule matches */
const DEFAULT_PART_OF_SPEECH: PartOfSpeech = 'adjective';

/** Words up to this many characters are Beginner */
const BEGINNER_MAX_LENGTH = 5;

/** Words up to this many characters are Intermediate; longer ones are Advanced */
const INTERMEDIATE_MAX_LENGTH = 9;

/**
 * Infers a part of speech from the word's ending.
 *
 * @example
 * ```typescript
 * inferPartOfSpeech('quickly');   // 'adverb'
 * inferPartOfSpeech('running');   // 'verb'
 * inferPartOfSpeech('happiness'); // 'noun'
 * inferPartOfSpeech('banana');    // 'adjective' (default)
 * ```
 */
export function inferPartOfSpeech(word: string): PartOfSpeech {
  const lower = word.toLowerCase();

  for (const [suffixes, pos] of SUFFIX_RULES) {
    if (suffixes.some((suffix) => lower.endsWith(suffix))) {
      return pos;
    }
  }

  return DEFAULT_PART_OF_SPEECH;
}

/**
 * Infers difficulty from the number of characters in the word.
 * Counts code points so accented and non-Latin letters count once.
 */
export function inferDifficulty(word: string): Difficulty {
  const length = Array.from(word).length;

  if (length <= BEGINNER_MAX_LENGTH) return 'Beginner';
  if (length <= INTERMEDIATE_MAX_LENGTH) return 'Intermediate';
  return 'Advanced';
}

/**
 * Upper-cases the first character and leaves the rest untouched.
 */
function capitalizeFirst(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('');
}

/**
 * Builds a simple learner-facing definition for the inferred role.
 */
export function buildFallbackMeaning(word: string, pos: PartOfSpeech): string {
  const head = capitalizeFirst(word);

  switch (pos) {
    case 'noun':
      return `${head} — a thing, person, or idea. (Simple explanation)`;
    case 'verb':
      return `${head} — to do or perform the action named by this word. (Simple explanation)`;
    case 'adjective':
      return `${head} — a word that describes a person, place, thing, or feeling. (Simple explanation)`;
    case 'adverb':
      return `${head} — a word that describes how an action is done. (Simple explanation)`;
    case 'other':
      return `${head} — a simple description of the word.`;
    default: {
      const unhandled: never = pos;
      throw new Error(`Unhandled part of speech: ${String(unhandled)}`);
    }
  }
}

/**
 * Builds two example sentences that use the word in the inferred role.
 */
export function buildFallbackExamples(word: string, pos: PartOfSpeech): string[] {
  switch (pos) {
    case 'adjective':
      return [`She is ${word}.`, `It was a ${word} day.`];
    case 'verb':
      return [`I ${word} every day.`, `They ${word} the problem together.`];
    case 'noun':
      return [`The ${word} was on the table.`, `She found a ${word}.`];
    case 'adverb':
      return [`He moved ${word}.`, `She spoke ${word}.`];
    case 'other':
      return [`I know the word ${word}.`, `This sentence uses ${word}.`];
    default: {
      const unhandled: never = pos;
      throw new Error(`Unhandled part of speech: ${String(unhandled)}`);
    }
  }
}

/**
 * Builds a complete WordEntry from the word's spelling alone.
 *
 * @param word - A trimmed, non-empty word
 * @returns A frozen entry with inferred role and difficulty, templated
 *   meaning and examples, and no synonyms
 */
export function buildHeuristicEntry(word: string): WordEntry {
  const partOfSpeech = inferPartOfSpeech(word);

  return Object.freeze({
    difficulty: inferDifficulty(word),
    meaning: buildFallbackMeaning(word, partOfSpeech),
    partOfSpeech,
    examples: Object.freeze(buildFallbackExamples(word, partOfSpeech)),
    synonyms: Object.freeze([]),
  });
}
