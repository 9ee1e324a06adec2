/**
 * Evaluation Result Types
 *
 * The EvaluationResult is the only externally visible output of the tutor.
 * Its field set and nesting are a contract with the serialization layer:
 *
 * ```json
 * {
 *   "sentenceFeedback": { "correctedSentence": "", "explanation": "...", "status": "Correct" },
 *   "wordAnalysis": { "difficulty": "Intermediate", "examples": [], "meaning": "...", "synonyms": [] }
 * }
 * ```
 *
 * A result is fully determined by the word, the sentence, the resolved
 * WordEntry and the classifier verdict.
 */

import type { Difficulty } from './word-entry';

/**
 * Verdict on how the learner used the target word.
 *
 * - 'Correct': the word is present, plays the expected role and reads naturally
 * - 'Mostly correct': the word is present but in another role, or awkwardly placed
 * - 'Incorrect': the word is missing from the sentence (or no word was given)
 */
export type UsageVerdict = 'Correct' | 'Mostly correct' | 'Incorrect';

/**
 * The WordEntry flattened for output. The part of speech is internal to the
 * evaluation and is left out.
 */
export interface WordAnalysis {
  difficulty: Difficulty;
  meaning: string;
  examples: string[];
  synonyms: string[];
}

/**
 * Feedback on the learner's sentence.
 */
export interface SentenceFeedback {
  status: UsageVerdict;

  /** Human-readable reason for the verdict */
  explanation: string;

  /**
   * A corrective example sentence. Empty when the usage was correct, and in
   * the "no word provided" result where no example can be built.
   */
  correctedSentence: string;
}

/**
 * Complete response for one evaluation call.
 */
export interface EvaluationResult {
  wordAnalysis: WordAnalysis;
  sentenceFeedback: SentenceFeedback;
}
