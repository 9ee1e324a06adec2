/**
 * Feedback Composer
 *
 * Turns the resolved WordEntry and the usage classification into the final
 * EvaluationResult. The verdict follows a fixed precedence:
 *
 * 1. word missing from the sentence       -> 'Incorrect'
 * 2. expected role and natural left word  -> 'Correct'
 * 3. anything else                        -> 'Mostly correct'
 *
 * Every non-correct verdict comes with a corrective sentence built for the
 * role the word is expected to play, never the role the learner used.
 */

import type {
  EvaluationResult,
  PartOfSpeech,
  SentenceFeedback,
  WordAnalysis,
  WordEntry,
} from '../models';
import type { UsageClassification } from '../scoring';
import { buildSimpleSentence, describePartOfSpeech } from './sentence-templates';

// =============================================================================
// Messages
// =============================================================================

export const FEEDBACK_MESSAGES = {
  wordMissing:
    'You did not use the target word in your sentence. Try to include it in a short, simple sentence.',
  noWordProvided: 'You did not provide a word to analyse.',
  couldBeMoreNatural:
    'You used the word, but the sentence could sound more natural. Try the suggestion.',
} as const;

/** Meaning shown when the learner submits an empty word */
export const NO_WORD_MEANING = 'No word provided.';

function correctUsageMessage(word: string): string {
  return `Great! You used “${word}” correctly in the sentence.`;
}

function roleMismatchMessage(expected: PartOfSpeech, actual: PartOfSpeech): string {
  return (
    `You used the word, but it usually works as a ${describePartOfSpeech(expected)}. ` +
    `In your sentence it looks like a ${describePartOfSpeech(actual)}. See the suggestion.`
  );
}

// =============================================================================
// Composition
// =============================================================================

/**
 * Flattens a WordEntry into the output shape, dropping the part of speech.
 * Arrays are copied so the result never aliases a curated entry.
 */
export function buildWordAnalysis(entry: WordEntry): WordAnalysis {
  return {
    difficulty: entry.difficulty,
    meaning: entry.meaning,
    examples: [...entry.examples],
    synonyms: [...entry.synonyms],
  };
}

/**
 * What the composer knows about the word's occurrence in the sentence.
 * `undefined` means the word was not found.
 */
export interface UsageObservation {
  /** The role the token plays in the sentence */
  actual: PartOfSpeech;
  classification: UsageClassification;
}

/**
 * Builds the sentence feedback for one evaluation.
 *
 * @param word - The trimmed target word, as the learner typed it
 * @param entry - The resolved WordEntry
 * @param usage - The observed usage, or undefined when the word is absent
 */
export function composeSentenceFeedback(
  word: string,
  entry: WordEntry,
  usage: UsageObservation | undefined
): SentenceFeedback {
  if (!usage) {
    return {
      status: 'Incorrect',
      explanation: FEEDBACK_MESSAGES.wordMissing,
      correctedSentence: buildSimpleSentence(word, entry.partOfSpeech),
    };
  }

  const { actual, classification } = usage;

  if (classification.matchesExpectedRole && classification.natural) {
    return {
      status: 'Correct',
      explanation: correctUsageMessage(word),
      correctedSentence: '',
    };
  }

  return {
    status: 'Mostly correct',
    explanation: classification.matchesExpectedRole
      ? FEEDBACK_MESSAGES.couldBeMoreNatural
      : roleMismatchMessage(entry.partOfSpeech, actual),
    correctedSentence: buildSimpleSentence(word, entry.partOfSpeech),
  };
}

/**
 * Builds the complete EvaluationResult.
 */
export function composeFeedback(
  word: string,
  entry: WordEntry,
  usage: UsageObservation | undefined
): EvaluationResult {
  return {
    wordAnalysis: buildWordAnalysis(entry),
    sentenceFeedback: composeSentenceFeedback(word, entry, usage),
  };
}

/**
 * The fixed result for an empty or whitespace-only word. No resolution or
 * sentence analysis happens in this case.
 */
export function noWordProvidedResult(): EvaluationResult {
  return {
    wordAnalysis: {
      difficulty: 'Beginner',
      meaning: NO_WORD_MEANING,
      examples: [],
      synonyms: [],
    },
    sentenceFeedback: {
      status: 'Incorrect',
      explanation: FEEDBACK_MESSAGES.noWordProvided,
      correctedSentence: '',
    },
  };
}
