/**
 * Core Domain Models - Barrel Export
 *
 * Re-exports the tutor's domain types for convenient importing.
 *
 * @example
 * ```typescript
 * import type { WordEntry, EvaluationResult, PartOfSpeech } from '@/core/models';
 * ```
 */

// Grammatical roles
export type { PartOfSpeech } from './part-of-speech';
export { PARTS_OF_SPEECH } from './part-of-speech';

// Word metadata produced by the entry resolver
export type { Difficulty, WordEntry, WordEntrySource } from './word-entry';
export { DIFFICULTIES } from './word-entry';

// Output record
export type {
  UsageVerdict,
  WordAnalysis,
  SentenceFeedback,
  EvaluationResult,
} from './evaluation-result';
