/**
 * External Entry Adapter
 *
 * Validates whatever the external dictionary returned and turns it into a
 * WordEntry. Sources are not trusted to follow the tutor's vocabulary
 * exactly, so the schema is lenient where it can be:
 *
 * - difficulty and part of speech are matched case-insensitively
 * - a missing or unrecognised difficulty is inferred from the word's length
 * - an unrecognised part of speech becomes 'other'
 * - missing examples and synonyms become empty arrays
 *
 * A payload without a usable meaning is rejected.
 */

import { z } from 'zod';
import { DIFFICULTIES, PARTS_OF_SPEECH } from '../models';
import type { Difficulty, PartOfSpeech, WordEntry } from '../models';
import { inferDifficulty } from './heuristic-entry-builder';

/**
 * Expected shape of an external dictionary payload.
 */
export const externalEntrySchema = z.object({
  difficulty: z.string().optional(),
  meaning: z.string().trim().min(1, 'meaning must not be empty'),
  partOfSpeech: z.string().optional(),
  examples: z.array(z.string()).default([]),
  synonyms: z.array(z.string()).default([]),
});

export type ExternalEntryData = z.input<typeof externalEntrySchema>;

function matchDifficulty(value: string | undefined): Difficulty | undefined {
  const normalized = value?.trim().toLowerCase();
  return DIFFICULTIES.find((difficulty) => difficulty.toLowerCase() === normalized);
}

function matchPartOfSpeech(value: string | undefined): PartOfSpeech {
  const normalized = value?.trim().toLowerCase();
  return PARTS_OF_SPEECH.find((pos) => pos === normalized) ?? 'other';
}

/**
 * Adapts an external payload into a WordEntry.
 *
 * @param word - The word that was looked up (used to infer a missing difficulty)
 * @param payload - The raw value returned by the external source
 * @returns The parse result: a frozen entry on success, the zod error otherwise
 */
export function adaptExternalEntry(
  word: string,
  payload: unknown
): { success: true; entry: WordEntry } | { success: false; error: z.ZodError } {
  const parsed = externalEntrySchema.safeParse(payload);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }

  const data = parsed.data;
  const entry: WordEntry = Object.freeze({
    difficulty: matchDifficulty(data.difficulty) ?? inferDifficulty(word),
    meaning: data.meaning,
    partOfSpeech: matchPartOfSpeech(data.partOfSpeech),
    examples: Object.freeze([...data.examples]),
    synonyms: Object.freeze([...data.synonyms]),
  });

  return { success: true, entry };
}
