/**
 * Tutor Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { TutorEngine } from '@/core/tutor';
 *
 * const engine = new TutorEngine();
 * const result = await engine.evaluate('happy', 'I feel happy today.', false);
 * ```
 */

export { TutorEngine } from './tutor-engine';
export type { TutorEngineDependencies, EvaluateOptions } from './types';
