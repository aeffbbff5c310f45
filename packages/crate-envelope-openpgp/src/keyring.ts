/**
 * An armored OpenPGP key as the keyring persists it.
 * `fingerprint` is upper-case hex without spaces.
 */
export type StoredKey = {
  fingerprint: string;
  armoredKey: string;
  isPrivate: boolean;
};

/**
 * Storage interface for keyring persistence.
 * Implement this interface to back the OpenPGP backend with any database.
 */
export interface KeyringStorage {
  listKeys(): Promise<StoredKey[]>;
  findKey(fingerprint: string): Promise<StoredKey | null>;
  /** Inserts the key or replaces the stored key with the same fingerprint. */
  saveKey(key: StoredKey): Promise<void>;
  deleteKey(fingerprint: string): Promise<boolean>;
}

/**
 * In-memory KeyringStorage for testing and development.
 */
export function createInMemoryKeyring(initial: StoredKey[] = []): KeyringStorage {
  const store = new Map<string, StoredKey>();
  for (const key of initial) {
    store.set(key.fingerprint, { ...key });
  }

  return {
    async listKeys() {
      return Array.from(store.values(), (key) => ({ ...key }));
    },

    async findKey(fingerprint) {
      const key = store.get(fingerprint);
      return key ? { ...key } : null;
    },

    async saveKey(key) {
      store.set(key.fingerprint, { ...key });
    },

    async deleteKey(fingerprint) {
      return store.delete(fingerprint);
    },
  };
}
