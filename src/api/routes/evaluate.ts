/**
 * Evaluation Routes
 *
 * POST /api/evaluate runs the tutor on one word and sentence.
 *
 * Request body:
 * ```json
 * { "word": "resilient", "sentence": "Resilient is good.", "useExternalSource": false }
 * ```
 *
 * Response:
 * ```json
 * {
 *   "success": true,
 *   "data": {
 *     "wordAnalysis": { "difficulty": "Intermediate", "meaning": "...", "examples": [...], "synonyms": [...] },
 *     "sentenceFeedback": { "status": "Mostly correct", "explanation": "...", "correctedSentence": "I am resilient." }
 *   }
 * }
 * ```
 */

import { Hono } from 'hono';
import type { TutorEngine } from '../../core/tutor';
import { hasCredential, type CredentialProvider } from '../../storage/credential-store';
import { validate } from '../middleware/validate';
import { evaluateRequestSchema } from '../types';
import { success } from '../utils/response';

/**
 * Collaborators the evaluation routes need.
 */
export interface EvaluateRouteDependencies {
  engine: TutorEngine;
  credentials: CredentialProvider;
}

/**
 * Creates the evaluation router.
 *
 * When the body leaves out `useExternalSource`, the external dictionary is
 * used exactly when an API key is stored. The request's abort signal is
 * passed to the engine so a disconnected client cancels its lookup.
 */
export function evaluateRoutes({ engine, credentials }: EvaluateRouteDependencies): Hono {
  const router = new Hono();

  router.post('/', validate(evaluateRequestSchema), async (c) => {
    const { word, sentence, useExternalSource } = c.get('validatedBody');
    const useExternal = useExternalSource ?? hasCredential(credentials);

    const result = await engine.evaluate(word, sentence, useExternal, {
      signal: c.req.raw.signal,
    });

    return success(c, result);
  });

  return router;
}
