/**
 * Compromise Tagger
 *
 * GrammaticalTagger implementation backed by the `compromise` NLP library.
 * compromise splits the sentence into terms and tags each with a hierarchy
 * of labels ("Adjective", "Verb", "PresentTense", "Pronoun", ...). This
 * adapter finds the term covering the requested span and folds its tags into
 * the tutor's closed PartOfSpeech union.
 */

import nlp from 'compromise';
import { z } from 'zod';
import type { PartOfSpeech } from '../models';
import type { TokenSpan } from '../tokenizer';
import type { GrammaticalTagger } from './types';

/**
 * The slice of compromise's JSON output this adapter relies on.
 * Everything else in the payload is ignored.
 */
const compromiseDocumentSchema = z.array(
  z.object({
    terms: z.array(
      z.object({
        text: z.string(),
        tags: z.array(z.string()),
      })
    ),
  })
);

type CompromiseTerm = z.infer<typeof compromiseDocumentSchema>[number]['terms'][number];

/**
 * Tag precedence when a term carries more than one label.
 * compromise files pronouns under Noun as well, so the closed-class
 * Pronoun tag is checked first and reads as a plain word.
 */
const TAG_PRECEDENCE: ReadonlyArray<[tag: string, pos: PartOfSpeech]> = [
  ['Pronoun', 'other'],
  ['Adverb', 'adverb'],
  ['Adjective', 'adjective'],
  ['Verb', 'verb'],
  ['Noun', 'noun'],
];

/**
 * Maps a compromise tag list onto a PartOfSpeech.
 */
export function mapCompromiseTags(tags: readonly string[]): PartOfSpeech {
  for (const [tag, pos] of TAG_PRECEDENCE) {
    if (tags.includes(tag)) {
      return pos;
    }
  }
  return 'other';
}

export class CompromiseTagger implements GrammaticalTagger {
  tag(text: string, span: TokenSpan): PartOfSpeech | undefined {
    const parsed = compromiseDocumentSchema.safeParse(nlp(text).json());
    if (!parsed.success) {
      console.warn('[Tagger] Unexpected compromise output shape:', parsed.error.message);
      return undefined;
    }

    const terms = parsed.data.flatMap((sentence) => sentence.terms);
    const term = findTermAt(text, terms, span.start);
    return term ? mapCompromiseTags(term.tags) : undefined;
  }
}

/**
 * Walks the terms in order, placing each one in the original text, and
 * returns the term whose range contains `offset`.
 *
 * Implicit terms from expanded contractions have empty text and are skipped.
 */
function findTermAt(
  text: string,
  terms: readonly CompromiseTerm[],
  offset: number
): CompromiseTerm | undefined {
  let cursor = 0;

  for (const term of terms) {
    if (term.text.length === 0) continue;

    const start = text.indexOf(term.text, cursor);
    if (start === -1) continue;

    const end = start + term.text.length;
    if (offset >= start && offset < end) {
      return term;
    }
    if (start > offset) {
      return undefined;
    }
    cursor = end;
  }

  return undefined;
}
