/**
 * Tutor Engine Types
 */

import type { WordEntry } from '../models';
import type { ExternalSourceLookup } from '../lexicon';
import type { GrammaticalTagger } from '../tagging';

/**
 * Injectable collaborators and settings for the TutorEngine.
 * Anything left out gets a sensible default.
 */
export interface TutorEngineDependencies {
  /** Part-of-speech tagger (default: CompromiseTagger) */
  tagger?: GrammaticalTagger;

  /** External dictionary; without one the external step is always skipped */
  externalSource?: ExternalSourceLookup;

  /** Curated entries keyed by lower-case word (default: built-in table) */
  localEntries?: ReadonlyMap<string, WordEntry>;

  /** Time budget for one external lookup in milliseconds */
  externalTimeoutMs?: number;
}

/**
 * Per-call options for TutorEngine.evaluate.
 */
export interface EvaluateOptions {
  /** Abort to cancel an in-flight external lookup */
  signal?: AbortSignal;
}
