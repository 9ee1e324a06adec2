/**
 * Tagging Module - Barrel Export
 *
 * Part-of-speech tagging behind the GrammaticalTagger collaborator interface.
 *
 * @example
 * ```typescript
 * import { CompromiseTagger, classifyToken } from '@/core/tagging';
 *
 * const role = classifyToken(new CompromiseTagger(), sentence, span, entry.partOfSpeech);
 * ```
 */

export type { GrammaticalTagger } from './types';
export { classifyToken } from './tagger-adapter';
export { CompromiseTagger, mapCompromiseTags } from './compromise-tagger';
