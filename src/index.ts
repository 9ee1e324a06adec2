/**
 * Vocabulary Usage Tutor - Library Entry Point
 *
 * Evaluates how a learner uses a vocabulary word in a sentence and returns
 * structured feedback.
 *
 * @example
 * ```typescript
 * import { TutorEngine, formatTutorResponse } from 'vocab-usage-tutor';
 *
 * const engine = new TutorEngine();
 * const result = await engine.evaluate('resilient', 'I am resilient when I feel sad.', false);
 * console.log(formatTutorResponse(result));
 * ```
 */

// Engine
export { TutorEngine, type TutorEngineDependencies, type EvaluateOptions } from './core/tutor';

// Domain types
export type {
  PartOfSpeech,
  Difficulty,
  WordEntry,
  WordEntrySource,
  UsageVerdict,
  WordAnalysis,
  SentenceFeedback,
  EvaluationResult,
} from './core/models';

// Collaborator contracts and shipped implementations
export type { GrammaticalTagger } from './core/tagging';
export { CompromiseTagger } from './core/tagging';
export {
  DictionaryLookupError,
  type DictionaryLookupErrorType,
  type ExternalSourceLookup,
} from './core/lexicon';
export { MockDictionarySource } from './dictionary';
export {
  SqliteCredentialStore,
  MemoryCredentialStore,
  createDatabase,
  type CredentialProvider,
} from './storage';

// Serialization
export { formatTutorResponse } from './core/export';

// HTTP API
export { createApp, startServer, type AppOptions } from './api';

// Configuration
export { loadConfig, ConfigValidationError, type Config } from './config';
