/**
 * WordEntry Domain Types
 *
 * A WordEntry is the descriptive metadata the tutor knows about a target
 * word: how hard it is, what it means, the role it usually plays and a few
 * examples and synonyms. Entries come from one of three producers (the
 * curated local table, the external dictionary source, the heuristic
 * builder) and are never mutated once created.
 */

import type { PartOfSpeech } from './part-of-speech';

/**
 * Learner-facing difficulty bands, serialized as-is in the word analysis.
 */
export type Difficulty = 'Beginner' | 'Intermediate' | 'Advanced';

/**
 * Every Difficulty value, from easiest to hardest.
 */
export const DIFFICULTIES = ['Beginner', 'Intermediate', 'Advanced'] as const satisfies readonly Difficulty[];

/**
 * Descriptive metadata for one vocabulary word.
 *
 * Invariants:
 * - `meaning` is never empty
 * - `examples` and `synonyms` are always arrays; absence is an empty array
 */
export interface WordEntry {
  readonly difficulty: Difficulty;

  /** Short learner-friendly definition */
  readonly meaning: string;

  /**
   * The role the word is expected to play. Usage in the learner's sentence
   * is judged against this role.
   */
  readonly partOfSpeech: PartOfSpeech;

  readonly examples: readonly string[];

  readonly synonyms: readonly string[];
}

/**
 * Which producer supplied a WordEntry. Carried alongside the entry for
 * logging; it never reaches the serialized result.
 */
export type WordEntrySource = 'local' | 'external' | 'heuristic';
