/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, SqliteCredentialStore } from '@/storage';
 *   const store = new SqliteCredentialStore(createDatabase(':memory:'));
 */

export { createDatabase, DEFAULT_DATABASE_PATH } from './db';
export type { AppDatabase } from './db';

export { credentials } from './schema';
export type { CredentialRow, NewCredentialRow } from './schema';

export {
  SqliteCredentialStore,
  MemoryCredentialStore,
  hasCredential,
  CREDENTIAL_SERVICE,
  DICTIONARY_KEY_ACCOUNT,
} from './credential-store';
export type { CredentialProvider, CredentialAddress } from './credential-store';
