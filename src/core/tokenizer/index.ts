/**
 * Tokenizer Module - Barrel Export
 *
 * Word location and boundary expansion inside learner sentences.
 */

export { locateWord, tokenText, isWordCharacter } from './boundary-locator';
export type { TokenSpan } from './types';
