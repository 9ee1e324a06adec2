/**
 * Test Helpers Module
 *
 * Deterministic stand-ins for the tutor's collaborators. The real tagger is
 * a statistical NLP library; tests that care about the verdict logic use
 * {@link lexiconTagger} so the role of each token is fixed by the test.
 */

import { vi } from 'vitest';
import type { PartOfSpeech } from '../src/core/models';
import type { GrammaticalTagger } from '../src/core/tagging';
import type { ExternalSourceLookup } from '../src/core/lexicon';

// ============================================================================
// Taggers
// ============================================================================

/**
 * Tags tokens by looking up their lower-cased text. Unknown tokens get no
 * opinion, so the engine falls back to the expected role.
 *
 * @example
 * ```typescript
 * const tagger = lexiconTagger({ resilient: 'adjective', run: 'verb' });
 * ```
 */
export function lexiconTagger(roles: Record<string, PartOfSpeech>): GrammaticalTagger {
  const table = new Map(Object.entries(roles));
  return {
    tag: (text, span) => table.get(text.slice(span.start, span.end).toLowerCase()),
  };
}

/**
 * A tagger with no opinion about anything.
 */
export function silentTagger(): GrammaticalTagger {
  return { tag: () => undefined };
}

// ============================================================================
// External sources
// ============================================================================

/**
 * An external source that answers every word with the same payload.
 */
export function sourceReturning(payload: unknown) {
  return {
    fetch: vi.fn(async (_word: string, _signal?: AbortSignal): Promise<unknown> => payload),
  } satisfies ExternalSourceLookup;
}

/**
 * An external source that never answers on its own and rejects once the
 * signal it was given aborts.
 */
export function hangingSource(): ExternalSourceLookup {
  return {
    fetch: (_word, signal) =>
      new Promise<unknown>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
      }),
  };
}

// ============================================================================
// Response helpers
// ============================================================================

/**
 * Parses a response body as JSON without asserting its shape.
 */
export async function readJson(response: Response): Promise<unknown> {
  const body: unknown = await response.json();
  return body;
}
