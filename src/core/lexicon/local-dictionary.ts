/**
 * Curated Local Dictionary
 *
 * Hand-written entries for words the tutor knows well. Lookups against this
 * table always win over the external source and the heuristic builder.
 * Keys are lower-case; lookups lower-case the word first.
 */

import type { WordEntry } from '../models';

export const LOCAL_DICTIONARY: ReadonlyMap<string, WordEntry> = new Map<string, WordEntry>([
  [
    'resilient',
    {
      difficulty: 'Intermediate',
      meaning: 'Able to recover quickly from problems or strong emotions; not easily discouraged.',
      partOfSpeech: 'adjective',
      examples: [
        'After losing her job, Maria stayed resilient and found a new role within months.',
        'Children can be very resilient after moving to a new school.',
      ],
      synonyms: ['tough', 'strong', 'adaptable'],
    },
  ],
  [
    'happy',
    {
      difficulty: 'Beginner',
      meaning: 'Feeling good and joyful.',
      partOfSpeech: 'adjective',
      examples: [
        'I feel happy when I spend time with my friends.',
        'She was happy with her exam results.',
      ],
      synonyms: ['joyful', 'glad', 'pleased'],
    },
  ],
  [
    'improve',
    {
      difficulty: 'Beginner',
      meaning: 'To become better or to make something better.',
      partOfSpeech: 'verb',
      examples: [
        'Practice every day to improve your English.',
        'He took lessons to improve his piano skills.',
      ],
      synonyms: ['get better', 'enhance', 'upgrade'],
    },
  ],
]);
