/**
 * Part-of-Speech Domain Types
 *
 * A PartOfSpeech is the grammatical role a word plays in a sentence. The set
 * is closed on purpose: every `switch` over a PartOfSpeech in the engine ends
 * in a `never` check, so adding a role fails to compile until the classifier,
 * the composer and the heuristic builder all handle it.
 *
 * 'other' is the safe default; the engine never carries an absent role.
 */

/**
 * Grammatical roles recognised by the tutor.
 *
 * - 'noun': a thing, person or idea
 * - 'verb': an action
 * - 'adjective': describes a noun
 * - 'adverb': describes how an action is done
 * - 'other': anything else (pronouns, prepositions, unknown tags)
 */
export type PartOfSpeech = 'noun' | 'verb' | 'adjective' | 'adverb' | 'other';

/**
 * Every PartOfSpeech value, in declaration order.
 * Used by validation schemas and by tests that need to walk the whole union.
 */
export const PARTS_OF_SPEECH = [
  'noun',
  'verb',
  'adjective',
  'adverb',
  'other',
] as const satisfies readonly PartOfSpeech[];
