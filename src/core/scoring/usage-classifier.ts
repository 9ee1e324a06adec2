/**
 * Usage Classifier
 *
 * Decides whether a located token is used in its expected role and whether
 * its immediate left context looks natural for the role it plays.
 *
 * The naturalness rule inspects only the single whitespace-separated word
 * right before the token, lower-cased, with any punctuation left attached
 * ("Well, happy" has "well," as its left word and no rule matches it).
 */

import type { PartOfSpeech } from '../models';
import type { TokenSpan } from '../tokenizer';
import type { UsageClassification } from './types';

/** Words that can introduce a predicative adjective ("I am resilient") */
export const LINKING_VERBS: ReadonlySet<string> = new Set([
  'is',
  'am',
  'are',
  'was',
  'were',
  'feel',
  'seem',
  'become',
  'looks',
  'look',
]);

/** Subject pronouns that can precede a verb ("We improve") */
export const SUBJECT_PRONOUNS: ReadonlySet<string> = new Set([
  'i',
  'we',
  'they',
  'she',
  'he',
  'you',
  'it',
]);

/** Determiners that can precede a noun ("the improvement") */
export const DETERMINERS: ReadonlySet<string> = new Set([
  'a',
  'an',
  'the',
  'my',
  'his',
  'her',
  'their',
]);

/**
 * Returns the word right before the span, lower-cased, or undefined when the
 * token opens the sentence.
 */
export function precedingWord(sentence: string, span: TokenSpan): string | undefined {
  const wordsBefore = sentence
    .slice(0, span.start)
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0);

  return wordsBefore.at(-1)?.toLowerCase();
}

/**
 * Applies the left-context rule for a role.
 *
 * Adjectives, verbs and nouns need a matching preceding word; adverbs and
 * other roles carry no constraint.
 */
export function isNaturalUsage(sentence: string, span: TokenSpan, role: PartOfSpeech): boolean {
  const previous = precedingWord(sentence, span);

  switch (role) {
    case 'adjective':
      return previous !== undefined && LINKING_VERBS.has(previous);
    case 'verb':
      return previous !== undefined && SUBJECT_PRONOUNS.has(previous);
    case 'noun':
      return previous !== undefined && DETERMINERS.has(previous);
    case 'adverb':
    case 'other':
      return true;
    default: {
      const unhandled: never = role;
      throw new Error(`Unhandled part of speech: ${String(unhandled)}`);
    }
  }
}

/**
 * Classifies the learner's usage of a located token.
 *
 * Naturalness is judged for the role the token actually plays in the
 * sentence; role match is plain equality with the expected role.
 *
 * @param sentence - The learner's sentence
 * @param span - The located token
 * @param actual - The role the token plays (tagger output or the expected role)
 * @param expected - The role from the resolved WordEntry
 *
 * @example
 * ```typescript
 * classifyUsage('I am resilient.', { start: 5, end: 14 }, 'adjective', 'adjective');
 * // { matchesExpectedRole: true, natural: true }
 * ```
 */
export function classifyUsage(
  sentence: string,
  span: TokenSpan,
  actual: PartOfSpeech,
  expected: PartOfSpeech
): UsageClassification {
  return {
    matchesExpectedRole: actual === expected,
    natural: isNaturalUsage(sentence, span, actual),
  };
}
