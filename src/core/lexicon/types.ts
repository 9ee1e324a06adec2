/**
 * Entry Resolution Types
 *
 * The entry resolver walks an ordered list of strategies; the first one that
 * produces a WordEntry wins. This module defines the strategy contract, the
 * external dictionary collaborator and the typed error used when that
 * collaborator fails.
 */

import type { WordEntry, WordEntrySource } from '../models';

/**
 * Per-call context handed to every strategy.
 */
export interface ResolutionContext {
  /** Aborted when the caller abandons the evaluation */
  signal?: AbortSignal;
}

/**
 * One fallible way of producing a WordEntry.
 */
export interface EntryStrategy {
  /** Which producer this strategy represents */
  readonly source: WordEntrySource;

  /**
   * @param word - The trimmed target word
   * @returns An entry, or undefined to let the next strategy try
   */
  tryResolve(word: string, context: ResolutionContext): Promise<WordEntry | undefined>;
}

/**
 * A WordEntry together with the producer that supplied it.
 */
export interface ResolvedEntry {
  entry: WordEntry;
  source: WordEntrySource;
}

/**
 * External dictionary collaborator.
 *
 * Implementations may perform I/O, should honour the abort signal, and may
 * return payloads in any shape: the resolver validates the result before
 * using it. Returning undefined means "no entry for this word".
 */
export interface ExternalSourceLookup {
  fetch(word: string, signal?: AbortSignal): Promise<unknown>;
}

/**
 * Categories of external lookup failure.
 */
export type DictionaryLookupErrorType =
  | 'timeout'           // Lookup exceeded the configured budget
  | 'aborted'           // Caller cancelled the evaluation
  | 'invalid_response'  // Payload did not match the expected shape
  | 'unavailable'       // Source returned no entry
  | 'unknown';          // Unexpected error from the source

/**
 * Error raised inside the external lookup path. Never escapes the resolver:
 * the external strategy logs it and lets the heuristic fallback run.
 */
export class DictionaryLookupError extends Error {
  /** The type of failure that occurred */
  type: DictionaryLookupErrorType;
  /** The original error that was caught, if any */
  cause?: unknown;

  constructor(message: string, type: DictionaryLookupErrorType, cause?: unknown) {
    super(message);
    this.name = 'DictionaryLookupError';
    this.type = type;
    this.cause = cause;
  }
}
