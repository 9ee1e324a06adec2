/**
 * Scoring Module - Barrel Export
 *
 * Role matching and left-context naturalness for the learner's token.
 */

export {
  classifyUsage,
  isNaturalUsage,
  precedingWord,
  LINKING_VERBS,
  SUBJECT_PRONOUNS,
  DETERMINERS,
} from './usage-classifier';
export type { UsageClassification } from './types';
