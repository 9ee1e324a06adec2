/**
 * Credential Storage
 *
 * The dictionary API key is the only secret the tutor keeps. Callers depend
 * on the synchronous {@link CredentialProvider} contract; two stores
 * implement it:
 *
 * - {@link SqliteCredentialStore}: persists the key in the credentials table
 * - {@link MemoryCredentialStore}: process-local
 */

import { and, eq } from 'drizzle-orm';
import type { AppDatabase } from './db';
import { credentials } from './schema';

// =============================================================================
// Contract
// =============================================================================

/**
 * Reads, writes and clears a single secret.
 *
 * `set` reports failure through its return value rather than throwing.
 */
export interface CredentialProvider {
  get(): string | undefined;
  set(value: string): boolean;
  clear(): void;
}

/** Service name the API key is filed under. */
export const CREDENTIAL_SERVICE = 'vocab-usage-tutor';

/** Account name of the dictionary API key within {@link CREDENTIAL_SERVICE}. */
export const DICTIONARY_KEY_ACCOUNT = 'dictionary_api_key';

/**
 * Address of one credential row.
 */
export interface CredentialAddress {
  service: string;
  account: string;
}

// =============================================================================
// SQLite-backed store
// =============================================================================

/**
 * Stores one credential in the SQLite `credentials` table.
 *
 * @example
 * const store = new SqliteCredentialStore(createDatabase(':memory:'));
 * store.set('test-secret'); // true
 * store.get();              // 'test-secret'
 */
export class SqliteCredentialStore implements CredentialProvider {
  private readonly address: CredentialAddress;

  constructor(
    private readonly db: AppDatabase,
    address: Partial<CredentialAddress> = {}
  ) {
    this.address = {
      service: address.service ?? CREDENTIAL_SERVICE,
      account: address.account ?? DICTIONARY_KEY_ACCOUNT,
    };
  }

  get(): string | undefined {
    const row = this.db
      .select({ value: credentials.value })
      .from(credentials)
      .where(this.matchesAddress())
      .get();
    return row?.value;
  }

  set(value: string): boolean {
    const now = new Date();
    try {
      this.db
        .insert(credentials)
        .values({ ...this.address, value, updatedAt: now })
        .onConflictDoUpdate({
          target: [credentials.service, credentials.account],
          set: { value, updatedAt: now },
        })
        .run();
      return true;
    } catch (error) {
      console.error('[Credentials] Failed to store credential:', error);
      return false;
    }
  }

  clear(): void {
    this.db.delete(credentials).where(this.matchesAddress()).run();
  }

  private matchesAddress() {
    return and(
      eq(credentials.service, this.address.service),
      eq(credentials.account, this.address.account)
    );
  }
}

// =============================================================================
// In-memory store
// =============================================================================

/**
 * Keeps the credential in memory for the lifetime of the instance.
 */
export class MemoryCredentialStore implements CredentialProvider {
  private value: string | undefined;

  constructor(initial?: string) {
    this.value = initial;
  }

  get(): string | undefined {
    return this.value;
  }

  set(value: string): boolean {
    this.value = value;
    return true;
  }

  clear(): void {
    this.value = undefined;
  }
}

/**
 * True when the provider holds a non-blank credential.
 */
export function hasCredential(provider: CredentialProvider): boolean {
  const value = provider.get();
  return value !== undefined && value.trim() !== '';
}
