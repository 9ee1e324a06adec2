/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for the SQLite file that backs credential storage.
 * A credential row mirrors a keychain item: a secret addressed by the
 * service that owns it and the account name inside that service.
 *
 * Timestamps are stored as milliseconds since epoch (integer).
 */

import { sqliteTable, text, integer, primaryKey } from 'drizzle-orm/sqlite-core';

/**
 * Credentials Table
 *
 * One secret per (service, account) pair. Writing the same pair again
 * replaces the stored value.
 */
export const credentials = sqliteTable(
  'credentials',
  {
    // Owning application, e.g. "vocab-usage-tutor"
    service: text('service').notNull(),

    // Item name within the service, e.g. "dictionary_api_key"
    account: text('account').notNull(),

    // The secret itself, stored as UTF-8 text
    value: text('value').notNull(),

    // Last time the value was written (milliseconds since epoch)
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.service, table.account] }),
  })
);

export type CredentialRow = typeof credentials.$inferSelect;
export type NewCredentialRow = typeof credentials.$inferInsert;
