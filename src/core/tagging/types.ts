/**
 * Grammatical Tagger Types
 *
 * The tagger is an external collaborator: it reads a sentence and reports the
 * part of speech of the token at a given span. The engine only depends on
 * this interface, so tests can swap in a deterministic stub and production
 * code can use any NLP library behind it.
 */

import type { PartOfSpeech } from '../models';
import type { TokenSpan } from '../tokenizer';

/**
 * Reports the part of speech of one token in context.
 */
export interface GrammaticalTagger {
  /**
   * @param text - The full sentence, so the tagger can use context
   * @param span - The token to classify
   * @returns The token's part of speech, or undefined when the tagger has no opinion
   */
  tag(text: string, span: TokenSpan): PartOfSpeech | undefined;
}
