/**
 * Entry Resolver
 *
 * Resolves the descriptive metadata for a target word by trying, in order:
 *
 * 1. the curated local dictionary
 * 2. the external dictionary source (only when requested and configured)
 * 3. the spelling-based heuristic
 *
 * The first strategy to produce an entry wins, so the order is load-bearing:
 * a curated entry always beats an external one, and an external one always
 * beats a guess. Resolution never fails outward; the heuristic is total.
 *
 * @example
 * ```typescript
 * const resolver = new EntryResolver({ externalSource: new MockDictionarySource() });
 * const { entry, source } = await resolver.resolve('serendipity', true);
 * ```
 */

import type { WordEntry } from '../models';
import { LOCAL_DICTIONARY } from './local-dictionary';
import {
  DEFAULT_EXTERNAL_TIMEOUT_MS,
  ExternalSourceStrategy,
  HeuristicStrategy,
  LocalTableStrategy,
} from './strategies';
import type {
  EntryStrategy,
  ExternalSourceLookup,
  ResolutionContext,
  ResolvedEntry,
} from './types';

/**
 * Collaborators and settings for the resolver.
 */
export interface EntryResolverOptions {
  /** External dictionary; without one the external step is skipped */
  externalSource?: ExternalSourceLookup;

  /** Curated entries keyed by lower-case word (default: built-in table) */
  localEntries?: ReadonlyMap<string, WordEntry>;

  /** Time budget for one external lookup in milliseconds */
  externalTimeoutMs?: number;
}

export class EntryResolver {
  private readonly localStrategy: LocalTableStrategy;
  private readonly externalStrategy: ExternalSourceStrategy | undefined;
  private readonly heuristicStrategy = new HeuristicStrategy();

  constructor(options: EntryResolverOptions = {}) {
    this.localStrategy = new LocalTableStrategy(options.localEntries ?? LOCAL_DICTIONARY);
    this.externalStrategy = options.externalSource
      ? new ExternalSourceStrategy(
          options.externalSource,
          options.externalTimeoutMs ?? DEFAULT_EXTERNAL_TIMEOUT_MS
        )
      : undefined;
  }

  /**
   * The fallible strategies for one call, in precedence order.
   */
  private strategiesFor(useExternalSource: boolean): EntryStrategy[] {
    const strategies: EntryStrategy[] = [this.localStrategy];
    if (useExternalSource && this.externalStrategy) {
      strategies.push(this.externalStrategy);
    }
    return strategies;
  }

  /**
   * Resolves a WordEntry for a trimmed, non-empty word.
   *
   * @param word - The target word
   * @param useExternalSource - Whether the external dictionary may be consulted
   * @param context - Carries the caller's abort signal
   * @returns The entry and the producer that supplied it
   * @throws The signal's abort reason if the caller cancels during the external lookup
   */
  async resolve(
    word: string,
    useExternalSource: boolean,
    context: ResolutionContext = {}
  ): Promise<ResolvedEntry> {
    for (const strategy of this.strategiesFor(useExternalSource)) {
      const entry = await strategy.tryResolve(word, context);
      if (entry) {
        return { entry, source: strategy.source };
      }
    }

    return {
      entry: await this.heuristicStrategy.tryResolve(word),
      source: this.heuristicStrategy.source,
    };
  }
}
