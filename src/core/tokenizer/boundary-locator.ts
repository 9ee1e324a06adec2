/**
 * Boundary Locator
 *
 * Finds where the target word occurs in a learner's sentence and widens the
 * match to real word boundaries. The widening matters for correctness: a
 * search for "resilient" inside "I am resiliently confident." must report
 * the token "resiliently", so the rest of the engine judges the word the
 * learner actually wrote rather than a fragment of it.
 *
 * Only the first case-insensitive occurrence is considered.
 */

import type { TokenSpan } from './types';

/** Letters of any script count as word characters. */
const LETTER = /\p{L}/u;

/** The apostrophe is treated as part of a word ("don't", "learner's"). */
const APOSTROPHE = "'";

/**
 * Escapes a literal string for use inside a RegExp source.
 */
function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whether the character is part of a word token.
 */
export function isWordCharacter(ch: string): boolean {
  return ch === APOSTROPHE || LETTER.test(ch);
}

/**
 * Locates the target word in a sentence and expands the match to the full
 * token that contains it.
 *
 * @param sentence - The learner's sentence
 * @param targetWord - The vocabulary word to look for
 * @returns The span of the containing token, or undefined if the word does not occur
 *
 * @example
 * ```typescript
 * locateWord('I am resilient when I feel sad.', 'resilient'); // { start: 5, end: 14 }
 * locateWord('I am resiliently confident.', 'resilient');     // { start: 5, end: 16 }
 * locateWord('Nothing here.', 'resilient');                   // undefined
 * ```
 */
export function locateWord(sentence: string, targetWord: string): TokenSpan | undefined {
  if (targetWord.length === 0) {
    return undefined;
  }

  // A case-insensitive RegExp keeps indices aligned with the original
  // sentence; lower-casing both strings can change their lengths.
  const match = new RegExp(escapeRegExp(targetWord), 'iu').exec(sentence);
  if (!match) {
    return undefined;
  }

  let start = match.index;
  let end = match.index + match[0].length;

  // Walk left while the previous character still belongs to the word
  while (start > 0 && isWordCharacter(sentence.charAt(start - 1))) {
    start--;
  }

  // Walk right while the next character still belongs to the word
  while (end < sentence.length && isWordCharacter(sentence.charAt(end))) {
    end++;
  }

  return { start, end };
}

/**
 * Returns the text covered by a span.
 */
export function tokenText(sentence: string, span: TokenSpan): string {
  return sentence.slice(span.start, span.end);
}
