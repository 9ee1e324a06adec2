/**
 * Tutor Response Serialization
 *
 * Renders an {@link EvaluationResult} as the JSON document clients display:
 * object keys sorted at every depth, two-space indentation. Array order is
 * preserved.
 *
 * @example
 * ```typescript
 * formatTutorResponse(result);
 * // {
 * //   "sentenceFeedback": {
 * //     "correctedSentence": "",
 * //     "explanation": "Great! ...",
 * //     "status": "Correct"
 * //   },
 * //   "wordAnalysis": { ... }
 * // }
 * ```
 */

import type { EvaluationResult } from '../models';

/** Document returned when a value cannot be encoded. */
export const ENCODE_FAILURE_PAYLOAD = '{ "error": "Failed to encode response" }';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copies plain objects with their keys in code-unit order, recursing into
 * arrays. Throws a TypeError on a cycle.
 */
function sortKeys(value: unknown, ancestors: Set<object> = new Set()): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ancestors.has(value)) {
    throw new TypeError('Converting circular structure to JSON');
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => sortKeys(item, ancestors));
    }
    if (!isPlainObject(value)) {
      return value;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key], ancestors);
    }
    return sorted;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Encodes any value with sorted keys and two-space indentation, or returns
 * {@link ENCODE_FAILURE_PAYLOAD} when encoding throws (cycles, BigInt) or
 * yields nothing.
 */
export function formatSortedJson(value: unknown): string {
  try {
    const encoded: string | undefined = JSON.stringify(sortKeys(value), null, 2);
    if (encoded === undefined) {
      console.error('[Export] Value has no JSON representation');
      return ENCODE_FAILURE_PAYLOAD;
    }
    return encoded;
  } catch (error) {
    console.error('[Export] Failed to encode response:', error);
    return ENCODE_FAILURE_PAYLOAD;
  }
}

/**
 * Encodes an evaluation result for display.
 */
export function formatTutorResponse(result: EvaluationResult): string {
  return formatSortedJson(result);
}
