/**
 * Mock Dictionary Source
 *
 * Stand-in for a real dictionary web service. It waits for a configurable
 * latency to mimic a network round trip, then answers every word with a
 * canned entry. The wait honours the abort signal, so timeouts and
 * cancellations behave as they would against a real service.
 *
 * @example
 * ```typescript
 * const source = new MockDictionarySource({ latencyMs: 0 });
 * const payload = await source.fetch('serendipity');
 * ```
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ExternalEntryData, ExternalSourceLookup } from '../core/lexicon';

/** Default simulated network latency */
export const DEFAULT_MOCK_LATENCY_MS = 400;

export interface MockDictionarySourceOptions {
  /** Simulated round-trip time in milliseconds */
  latencyMs?: number;
}

export class MockDictionarySource implements ExternalSourceLookup {
  private readonly latencyMs: number;

  constructor(options: MockDictionarySourceOptions = {}) {
    this.latencyMs = options.latencyMs ?? DEFAULT_MOCK_LATENCY_MS;
  }

  async fetch(word: string, signal?: AbortSignal): Promise<ExternalEntryData> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, undefined, { signal });
    } else {
      signal?.throwIfAborted();
    }

    return {
      difficulty: 'Intermediate',
      meaning: `A mock meaning for ${word}. (This is a demo fallback.)`,
      partOfSpeech: 'adjective',
      examples: [`This is a mock example using ${word}.`, `Another mock sentence with ${word}.`],
      synonyms: ['sample', 'demo'],
    };
  }
}
