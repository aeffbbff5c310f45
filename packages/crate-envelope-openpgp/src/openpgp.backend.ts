import {
  normalizeFingerprint,
  type DecryptResult,
  type EncryptionBackend,
  type EncryptResult,
  type KeyImportResult,
  type KeyImportStatus,
  type LocalKeyInfo,
  type Logger,
} from "@crate-envelope/core";
import * as openpgp from "openpgp";
import type { KeyringStorage, StoredKey } from "./keyring.js";
import { keyserverGetUrl } from "./keyserver.js";

export type FetchLike = (url: string) => Promise<Response>;

export type OpenPgpBackendOptions = {
  keyring: KeyringStorage;
  /** Unlocks passphrase-protected private keys on decrypt. */
  passphrase?: string;
  fetch?: FetchLike;
  logger?: Logger;
};

export interface OpenPgpBackend extends EncryptionBackend {
  /**
   * Stores every key of an armored block. A public key never replaces a
   * private key already in the keyring.
   *
   * @returns fingerprints of the keys read from the block
   */
  importKey(armored: string): Promise<string[]>;
  exportPublicKey(fingerprint: string): Promise<string | null>;
  deleteKey(fingerprint: string): Promise<boolean>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toStoredKey(key: openpgp.Key): StoredKey {
  return {
    fingerprint: normalizeFingerprint(key.getFingerprint()),
    armoredKey: key.armor(),
    isPrivate: key.isPrivate(),
  };
}

/**
 * EncryptionBackend on OpenPGP.js. Keys live in the given KeyringStorage as
 * armored blocks and are parsed on demand.
 *
 * @example
 * ```typescript
 * const backend = createOpenPgpBackend({ keyring: createInMemoryKeyring() });
 * await backend.importKey(armoredPublicKey);
 * const crypt = createCrateEncryption({ backend });
 * ```
 */
export function createOpenPgpBackend(options: OpenPgpBackendOptions): OpenPgpBackend {
  const { keyring, logger } = options;
  const fetchKey: FetchLike = options.fetch ?? ((url) => fetch(url));

  async function storeKey(key: openpgp.Key): Promise<string> {
    const stored = toStoredKey(key);
    const existing = await keyring.findKey(stored.fingerprint);
    if (existing?.isPrivate && !stored.isPrivate) {
      logger?.debug?.(
        { fingerprint: stored.fingerprint },
        "Private key already in keyring, public key not stored",
      );
      return stored.fingerprint;
    }
    await keyring.saveKey(stored);
    logger?.debug?.(
      { fingerprint: stored.fingerprint, isPrivate: stored.isPrivate },
      "Stored key",
    );
    return stored.fingerprint;
  }

  async function importKey(armored: string): Promise<string[]> {
    const keys = await openpgp.readKeys({ armoredKeys: armored });
    const fingerprints: string[] = [];
    for (const key of keys) {
      fingerprints.push(await storeKey(key));
    }
    return fingerprints;
  }

  async function unlockedPrivateKeys(): Promise<openpgp.PrivateKey[]> {
    const unlocked: openpgp.PrivateKey[] = [];
    for (const stored of await keyring.listKeys()) {
      if (!stored.isPrivate) continue;
      const key = await openpgp.readPrivateKey({ armoredKey: stored.armoredKey });
      if (key.isDecrypted()) {
        unlocked.push(key);
        continue;
      }
      if (options.passphrase === undefined) {
        logger?.debug?.(
          { fingerprint: stored.fingerprint },
          "Private key is locked and no passphrase is configured",
        );
        continue;
      }
      try {
        unlocked.push(
          await openpgp.decryptKey({ privateKey: key, passphrase: options.passphrase }),
        );
      } catch (error) {
        logger?.warn?.(
          { fingerprint: stored.fingerprint, error: errorMessage(error) },
          "Unable to unlock private key",
        );
      }
    }
    return unlocked;
  }

  return {
    importKey,

    async exportPublicKey(fingerprint) {
      const stored = await keyring.findKey(normalizeFingerprint(fingerprint));
      if (!stored) return null;
      const key = await openpgp.readKey({ armoredKey: stored.armoredKey });
      return key.toPublic().armor();
    },

    async deleteKey(fingerprint) {
      return keyring.deleteKey(normalizeFingerprint(fingerprint));
    },

    async encrypt(plaintext, recipients): Promise<EncryptResult> {
      if (recipients.length === 0) {
        return { ok: false, status: "no recipients specified" };
      }
      const encryptionKeys: openpgp.PublicKey[] = [];
      for (const recipient of recipients) {
        const stored = await keyring.findKey(normalizeFingerprint(recipient));
        if (!stored) {
          return { ok: false, status: `invalid recipient: ${recipient}` };
        }
        const key = await openpgp.readKey({ armoredKey: stored.armoredKey });
        encryptionKeys.push(key.toPublic());
      }
      try {
        const message = await openpgp.createMessage({ binary: plaintext });
        const ciphertext = await openpgp.encrypt({ message, encryptionKeys });
        return { ok: true, ciphertext };
      } catch (error) {
        return { ok: false, status: `encryption failed: ${errorMessage(error)}` };
      }
    },

    async decrypt(ciphertext): Promise<DecryptResult> {
      let message: openpgp.Message<string>;
      try {
        message = await openpgp.readMessage({ armoredMessage: ciphertext });
      } catch {
        return { ok: false, status: "no valid message data found" };
      }
      const decryptionKeys = await unlockedPrivateKeys();
      if (decryptionKeys.length === 0) {
        return { ok: false, status: "decryption failed: no secret key" };
      }
      try {
        const { data } = await openpgp.decrypt({
          message,
          decryptionKeys,
          format: "binary",
        });
        return { ok: true, plaintext: data };
      } catch (error) {
        return { ok: false, status: `decryption failed: ${errorMessage(error)}` };
      }
    },

    async listLocalKeys() {
      const keys = new Map<string, LocalKeyInfo>();
      for (const stored of await keyring.listKeys()) {
        const key = await openpgp.readKey({ armoredKey: stored.armoredKey });
        keys.set(stored.fingerprint, {
          algorithm: key.getAlgorithmInfo().algorithm,
          identities: key.getUserIDs(),
          hasSecret: stored.isPrivate,
        });
      }
      return keys;
    },

    async fetchKeys(keyserverUrl, fingerprints): Promise<KeyImportResult> {
      const imported: string[] = [];
      const results: KeyImportStatus[] = [];
      for (const requested of fingerprints) {
        const fingerprint = normalizeFingerprint(requested);
        const response = await fetchKey(keyserverGetUrl(keyserverUrl, fingerprint));
        if (!response.ok) {
          results.push({
            fingerprint,
            ok: false,
            problem: "not found",
            text: `Keyserver answered ${response.status}`,
          });
          continue;
        }
        let keys: openpgp.Key[];
        try {
          keys = await openpgp.readKeys({ armoredKeys: await response.text() });
        } catch (error) {
          results.push({
            fingerprint,
            ok: false,
            problem: "invalid key data",
            text: errorMessage(error),
          });
          continue;
        }
        const match = keys.find(
          (key) => normalizeFingerprint(key.getFingerprint()) === fingerprint,
        );
        if (!match) {
          results.push({
            fingerprint,
            ok: false,
            problem: "fingerprint mismatch",
            text: "Keyserver returned a different key",
          });
          continue;
        }
        await storeKey(match.toPublic());
        imported.push(fingerprint);
        results.push({ fingerprint, ok: true });
      }
      return { fingerprints: imported, results };
    },
  };
}
