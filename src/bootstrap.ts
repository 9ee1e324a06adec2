/**
 * Service Wiring
 *
 * Builds the long-lived collaborators from configuration. The HTTP server
 * and the CLI share this so both see the same credential database and the
 * same dictionary settings.
 */

import type { Config } from './config';
import { TutorEngine } from './core/tutor';
import { MockDictionarySource } from './dictionary';
import { createDatabase, SqliteCredentialStore, type CredentialProvider } from './storage';

export interface TutorServices {
  engine: TutorEngine;
  credentials: CredentialProvider;
}

export function createTutorServices(config: Config): TutorServices {
  const credentials = new SqliteCredentialStore(createDatabase(config.database.path));

  const engine = new TutorEngine({
    externalSource: new MockDictionarySource({ latencyMs: config.externalSource.mockLatencyMs }),
    externalTimeoutMs: config.externalSource.timeoutMs,
  });

  return { engine, credentials };
}
