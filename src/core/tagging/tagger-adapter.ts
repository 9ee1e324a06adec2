/**
 * Lexical Tagger Adapter
 *
 * Guarantees downstream logic always receives a part of speech. When the
 * tagger collaborator has no answer for the token (or fails outright), the
 * role the resolved WordEntry expects is used instead, which in practice
 * means "assume the learner used the word the way it is normally used".
 */

import type { PartOfSpeech } from '../models';
import type { TokenSpan } from '../tokenizer';
import type { GrammaticalTagger } from './types';

/**
 * Classifies the token at `span`, falling back to the expected role.
 *
 * @param tagger - The grammatical tagger collaborator
 * @param sentence - The learner's sentence
 * @param span - The located token
 * @param expected - The role from the resolved WordEntry
 * @returns The tagged role, or `expected` when the tagger yields nothing
 */
export function classifyToken(
  tagger: GrammaticalTagger,
  sentence: string,
  span: TokenSpan,
  expected: PartOfSpeech
): PartOfSpeech {
  try {
    return tagger.tag(sentence, span) ?? expected;
  } catch (error) {
    console.warn('[Tagger] Tagging failed, assuming the expected role:', error);
    return expected;
  }
}
