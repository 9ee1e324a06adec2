/**
 * Lexicon Module - Barrel Export
 *
 * Word metadata resolution: curated table, external dictionary, heuristic.
 */

export { EntryResolver, type EntryResolverOptions } from './entry-resolver';
export {
  LocalTableStrategy,
  ExternalSourceStrategy,
  HeuristicStrategy,
  fetchWithTimeout,
  DEFAULT_EXTERNAL_TIMEOUT_MS,
} from './strategies';
export { LOCAL_DICTIONARY } from './local-dictionary';
export {
  buildHeuristicEntry,
  inferPartOfSpeech,
  inferDifficulty,
  buildFallbackMeaning,
  buildFallbackExamples,
} from './heuristic-entry-builder';
export { adaptExternalEntry, externalEntrySchema, type ExternalEntryData } from './external-entry';
export {
  DictionaryLookupError,
  type DictionaryLookupErrorType,
  type EntryStrategy,
  type ExternalSourceLookup,
  type ResolutionContext,
  type ResolvedEntry,
} from './types';
