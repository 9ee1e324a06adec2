/**
 * Credential Routes
 *
 * Manage the stored dictionary API key. The key is write-only over HTTP:
 * reads report whether one is configured, never its value.
 *
 * - GET    /api/credentials  -> { configured: boolean }
 * - PUT    /api/credentials  -> { saved: true }    body { apiKey }
 * - DELETE /api/credentials  -> { cleared: true }
 */

import { Hono } from 'hono';
import { hasCredential, type CredentialProvider } from '../../storage/credential-store';
import { AppError, ErrorCodes } from '../middleware/error-handler';
import { validate } from '../middleware/validate';
import { saveCredentialSchema } from '../types';
import { success } from '../utils/response';

export interface CredentialStatus {
  configured: boolean;
}

export function credentialsRoutes(credentials: CredentialProvider): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const status: CredentialStatus = { configured: hasCredential(credentials) };
    return success(c, status);
  });

  router.put('/', validate(saveCredentialSchema), (c) => {
    const { apiKey } = c.get('validatedBody');

    if (!credentials.set(apiKey)) {
      throw new AppError(ErrorCodes.DATABASE_ERROR, 'Failed to store the API key', 500);
    }

    return success(c, { saved: true });
  });

  router.delete('/', (c) => {
    credentials.clear();
    return success(c, { cleared: true });
  });

  return router;
}
