/**
 * Database schema types for the keyring table.
 */

export interface KeyringTable {
  /** Upper-case hex fingerprint of the primary key. */
  fingerprint: string;
  armored_key: string;
  key_kind: "public" | "private";
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
}

/**
 * Database schema interface that includes the keyring table.
 *
 * @example
 * ```typescript
 * import type { KeyringDatabase } from '@crate-envelope/kysely';
 *
 * const db = new Kysely<KeyringDatabase>({ dialect });
 * ```
 */
export interface KeyringDatabase {
  crate_keyring: KeyringTable;
}
