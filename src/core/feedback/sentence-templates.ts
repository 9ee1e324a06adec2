/**
 * Sentence Templates
 *
 * Short, role-specific example sentences used as the corrective suggestion
 * in feedback, plus the learner-facing names of each role.
 */

import type { PartOfSpeech } from '../models';

/**
 * Builds a minimal sentence that uses `word` in the given role.
 * Total over PartOfSpeech; the result always contains `word` verbatim.
 *
 * @example
 * ```typescript
 * buildSimpleSentence('resilient', 'adjective'); // 'I am resilient.'
 * buildSimpleSentence('improve', 'verb');        // 'I improve every day.'
 * ```
 */
export function buildSimpleSentence(word: string, pos: PartOfSpeech): string {
  switch (pos) {
    case 'adjective':
      return `I am ${word}.`;
    case 'verb':
      return `I ${word} every day.`;
    case 'noun':
      return `This is a ${word}.`;
    case 'adverb':
      return `She did it ${word}.`;
    case 'other':
      return `I know the word ${word}.`;
    default: {
      const unhandled: never = pos;
      throw new Error(`Unhandled part of speech: ${String(unhandled)}`);
    }
  }
}

/**
 * Learner-facing name of a role. 'other' reads as the neutral "word".
 */
export function describePartOfSpeech(pos: PartOfSpeech): string {
  switch (pos) {
    case 'noun':
      return 'noun';
    case 'verb':
      return 'verb';
    case 'adjective':
      return 'adjective';
    case 'adverb':
      return 'adverb';
    case 'other':
      return 'word';
    default: {
      const unhandled: never = pos;
      throw new Error(`Unhandled part of speech: ${String(unhandled)}`);
    }
  }
}
