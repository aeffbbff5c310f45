import {
  createOpenPgpBackend as createOpenPgpBackendCore,
  type KeyringStorage,
  type OpenPgpBackend,
  type OpenPgpBackendOptions,
  type StoredKey,
} from "@crate-envelope/openpgp";
import type { Kysely } from "kysely";
import type { KeyringDatabase, KeyringTable } from "../schema/keyring-schema.js";

function toStoredKey(
  row: Pick<KeyringTable, "fingerprint" | "armored_key" | "key_kind">,
): StoredKey {
  return {
    fingerprint: row.fingerprint,
    armoredKey: row.armored_key,
    isPrivate: row.key_kind === "private",
  };
}

/**
 * Kysely-specific implementation of the KeyringStorage interface.
 * Saving a key upserts on its fingerprint.
 *
 * @param db - Kysely database instance that includes the KeyringDatabase schema
 */
export function createKeyringStorage(db: Kysely<KeyringDatabase>): KeyringStorage {
  return {
    async listKeys() {
      const rows = await db
        .selectFrom("crate_keyring")
        .select(["fingerprint", "armored_key", "key_kind"])
        .orderBy("created_at")
        .orderBy("fingerprint")
        .execute();
      return rows.map(toStoredKey);
    },

    async findKey(fingerprint) {
      const row = await db
        .selectFrom("crate_keyring")
        .select(["fingerprint", "armored_key", "key_kind"])
        .where("fingerprint", "=", fingerprint)
        .executeTakeFirst();
      return row ? toStoredKey(row) : null;
    },

    async saveKey(key) {
      const now = new Date().toISOString();
      const keyKind = key.isPrivate ? "private" : "public";
      await db
        .insertInto("crate_keyring")
        .values({
          fingerprint: key.fingerprint,
          armored_key: key.armoredKey,
          key_kind: keyKind,
          created_at: now,
          updated_at: now,
        })
        .onConflict((oc) =>
          oc.column("fingerprint").doUpdateSet({
            armored_key: key.armoredKey,
            key_kind: keyKind,
            updated_at: now,
          }),
        )
        .execute();
    },

    async deleteKey(fingerprint) {
      const result = await db
        .deleteFrom("crate_keyring")
        .where("fingerprint", "=", fingerprint)
        .executeTakeFirst();
      return result.numDeletedRows > 0n;
    },
  };
}

/**
 * Create an OpenPGP backend whose keyring lives in a Kysely database.
 *
 * @example
 * ```typescript
 * import { createOpenPgpBackend } from '@crate-envelope/kysely';
 *
 * const backend = createOpenPgpBackend(db, { passphrase, logger });
 * await backend.importKey(armoredPrivateKey);
 * ```
 */
export function createOpenPgpBackend(
  db: Kysely<KeyringDatabase>,
  options: Omit<OpenPgpBackendOptions, "keyring"> = {},
): OpenPgpBackend {
  return createOpenPgpBackendCore({ ...options, keyring: createKeyringStorage(db) });
}
