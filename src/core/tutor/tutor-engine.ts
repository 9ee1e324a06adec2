/**
 * Tutor Engine
 *
 * The single entry point of the vocabulary tutor. Given a target word, the
 * learner's sentence and whether the external dictionary may be used, it
 * produces the structured EvaluationResult:
 *
 * 1. Resolve the word's metadata (local table, external source, heuristic)
 * 2. Locate the word in the sentence and expand to full word boundaries
 * 3. Tag the located token, defaulting to the expected role
 * 4. Classify role match and left-context naturalness
 * 5. Compose the verdict, explanation and corrective sentence
 *
 * The engine holds no mutable state; concurrent evaluations are independent.
 * Its only suspension point is the optional external lookup.
 *
 * Usage:
 * ```typescript
 * const engine = new TutorEngine({ externalSource: new MockDictionarySource() });
 * const result = await engine.evaluate('resilient', 'I am resilient when I feel sad.', false);
 * console.log(result.sentenceFeedback.status); // 'Correct'
 * ```
 */

import type { EvaluationResult, PartOfSpeech } from '../models';
import { EntryResolver } from '../lexicon';
import { CompromiseTagger, classifyToken, type GrammaticalTagger } from '../tagging';
import { locateWord } from '../tokenizer';
import { classifyUsage } from '../scoring';
import { composeFeedback, noWordProvidedResult, type UsageObservation } from '../feedback';
import type { EvaluateOptions, TutorEngineDependencies } from './types';

export class TutorEngine {
  /** Resolves WordEntry metadata through the ordered strategies */
  private readonly resolver: EntryResolver;

  /** Grammatical tagger collaborator */
  private readonly tagger: GrammaticalTagger;

  constructor(dependencies: TutorEngineDependencies = {}) {
    this.tagger = dependencies.tagger ?? new CompromiseTagger();
    this.resolver = new EntryResolver({
      externalSource: dependencies.externalSource,
      localEntries: dependencies.localEntries,
      externalTimeoutMs: dependencies.externalTimeoutMs,
    });
  }

  /**
   * Evaluates the learner's use of `word` in `sentence`.
   *
   * Never rejects for bad input or collaborator failures; every degraded path
   * still yields a well-formed result. The only rejection is a caller
   * cancellation through `options.signal`, which rejects with the signal's
   * reason.
   *
   * @param word - The target vocabulary word (surrounding whitespace is ignored)
   * @param sentence - The learner's sentence
   * @param useExternalSource - Whether the external dictionary may be consulted
   * @param options - Per-call options such as an abort signal
   */
  async evaluate(
    word: string,
    sentence: string,
    useExternalSource: boolean,
    options: EvaluateOptions = {}
  ): Promise<EvaluationResult> {
    const target = word.trim();
    if (target.length === 0) {
      return noWordProvidedResult();
    }

    const { entry } = await this.resolver.resolve(target, useExternalSource, {
      signal: options.signal,
    });
    options.signal?.throwIfAborted();

    return composeFeedback(target, entry, this.observeUsage(target, sentence, entry.partOfSpeech));
  }

  /**
   * Locates and classifies the word in the sentence, or returns undefined
   * when it does not occur.
   */
  private observeUsage(
    word: string,
    sentence: string,
    expected: PartOfSpeech
  ): UsageObservation | undefined {
    const span = locateWord(sentence, word);
    if (!span) {
      return undefined;
    }

    const actual = classifyToken(this.tagger, sentence, span, expected);
    return {
      actual,
      classification: classifyUsage(sentence, span, actual, expected),
    };
  }
}
