/**
 * Feedback Module - Barrel Export
 *
 * Verdicts, explanations and corrective example sentences.
 */

export {
  composeFeedback,
  composeSentenceFeedback,
  buildWordAnalysis,
  noWordProvidedResult,
  FEEDBACK_MESSAGES,
  NO_WORD_MEANING,
  type UsageObservation,
} from './feedback-composer';
export { buildSimpleSentence, describePartOfSpeech } from './sentence-templates';
