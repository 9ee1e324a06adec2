/**
 * Entry Resolution Strategies
 *
 * The three producers of a WordEntry, each behind the EntryStrategy
 * interface so they can be tested on their own:
 *
 * 1. LocalTableStrategy - exact case-insensitive lookup in a curated table
 * 2. ExternalSourceStrategy - bounded, cancellable call to the external dictionary
 * 3. HeuristicStrategy - spelling-based inference; never returns undefined
 */

import type { WordEntry } from '../models';
import { adaptExternalEntry } from './external-entry';
import { buildHeuristicEntry } from './heuristic-entry-builder';
import {
  DictionaryLookupError,
  type EntryStrategy,
  type ExternalSourceLookup,
  type ResolutionContext,
} from './types';

/** Default time budget for one external lookup */
export const DEFAULT_EXTERNAL_TIMEOUT_MS = 3000;

// =============================================================================
// Local Table
// =============================================================================

export class LocalTableStrategy implements EntryStrategy {
  readonly source = 'local' as const;

  constructor(private readonly entries: ReadonlyMap<string, WordEntry>) {}

  async tryResolve(word: string): Promise<WordEntry | undefined> {
    return this.entries.get(word.toLowerCase());
  }
}

// =============================================================================
// External Source
// =============================================================================

/**
 * Calls the external source with a time budget.
 *
 * The source receives an AbortSignal that fires when either the budget runs
 * out or the caller's own signal aborts. The returned promise settles as
 * soon as that happens, even if the source ignores the signal.
 *
 * @throws DictionaryLookupError with type 'timeout' or 'aborted', or 'unknown'
 *   wrapping an error thrown by the source
 */
export async function fetchWithTimeout(
  lookup: ExternalSourceLookup,
  word: string,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<unknown> {
  signal?.throwIfAborted();

  const controller = new AbortController();

  const onCallerAbort = (): void => {
    controller.abort(new DictionaryLookupError(`Lookup for "${word}" was cancelled`, 'aborted'));
  };
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  const timer = setTimeout(() => {
    controller.abort(
      new DictionaryLookupError(`Lookup for "${word}" timed out after ${timeoutMs}ms`, 'timeout')
    );
  }, timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });

  try {
    return await Promise.race([lookup.fetch(word, controller.signal), aborted]);
  } catch (error) {
    if (error instanceof DictionaryLookupError) {
      throw error;
    }
    // A source that honours the signal rejects with its own AbortError;
    // report the reason we aborted with instead.
    if (controller.signal.aborted && controller.signal.reason instanceof DictionaryLookupError) {
      throw controller.signal.reason;
    }
    throw new DictionaryLookupError(`Lookup for "${word}" failed`, 'unknown', error);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}

export class ExternalSourceStrategy implements EntryStrategy {
  readonly source = 'external' as const;

  constructor(
    private readonly lookup: ExternalSourceLookup,
    private readonly timeoutMs: number = DEFAULT_EXTERNAL_TIMEOUT_MS
  ) {}

  /**
   * Returns the adapted external entry, or undefined on any failure so the
   * heuristic can run. A cancellation by the caller is the one exception:
   * it is rethrown so the whole evaluation stops.
   */
  async tryResolve(word: string, context: ResolutionContext): Promise<WordEntry | undefined> {
    try {
      const payload = await fetchWithTimeout(this.lookup, word, this.timeoutMs, context.signal);

      if (payload === undefined || payload === null) {
        throw new DictionaryLookupError(`No external entry for "${word}"`, 'unavailable');
      }

      const adapted = adaptExternalEntry(word, payload);
      if (!adapted.success) {
        throw new DictionaryLookupError(
          `External entry for "${word}" is malformed: ${adapted.error.message}`,
          'invalid_response',
          adapted.error
        );
      }

      return adapted.entry;
    } catch (error) {
      context.signal?.throwIfAborted();

      const reason = error instanceof DictionaryLookupError ? `${error.type}: ${error.message}` : error;
      console.warn('[EntryResolver] External lookup failed, using heuristic fallback.', reason);
      return undefined;
    }
  }
}

// =============================================================================
// Heuristic
// =============================================================================

export class HeuristicStrategy implements EntryStrategy {
  readonly source = 'heuristic' as const;

  async tryResolve(word: string): Promise<WordEntry> {
    return buildHeuristicEntry(word);
  }
}
