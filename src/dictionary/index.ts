/**
 * Dictionary Module - Barrel Export
 *
 * External dictionary sources implementing ExternalSourceLookup.
 */

export {
  MockDictionarySource,
  DEFAULT_MOCK_LATENCY_MS,
  type MockDictionarySourceOptions,
} from './mock-dictionary-source';
