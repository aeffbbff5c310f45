import { randomUUID } from "node:crypto";
import { z } from "zod";
import { normalizeFingerprint } from "../identity/key-identity.js";
import type {
  EncryptionBackend,
  KeyIdentity,
  KeyImportStatus,
  LocalKeyInfo,
} from "../types.js";

export type InMemoryKey = KeyIdentity & { hasSecret: boolean };

export interface InMemoryBackend extends EncryptionBackend {
  importKey(key: InMemoryKey): void;
  /** Forgets the secret half of a key, keeping the public key. */
  deleteSecretKey(fingerprint: string): boolean;
}

const ARMOR_HEADER = "-----BEGIN CRATE ENVELOPE TEST MESSAGE-----";
const ARMOR_FOOTER = "-----END CRATE ENVELOPE TEST MESSAGE-----";
const ARMOR_RE = new RegExp(`^${ARMOR_HEADER}\\n([A-Za-z0-9+/=]+)\\n${ARMOR_FOOTER}$`);

const messageSchema = z.object({
  to: z.array(z.string()),
  nonce: z.string(),
  data: z.string(),
});

/**
 * In-memory EncryptionBackend for testing and development.
 *
 * Messages are base64 encoded, NOT encrypted. The backend only enforces who
 * may open a message: decryption succeeds when one of its recipients has a
 * secret key in the keyring, which is enough to exercise partial access.
 */
export function createInMemoryBackend(options?: {
  keys?: InMemoryKey[];
  /** Keys each keyserver URL serves to `fetchKeys`. */
  keyservers?: Record<string, KeyIdentity[]>;
}): InMemoryBackend {
  const keyring = new Map<string, InMemoryKey>();
  for (const key of options?.keys ?? []) {
    const fingerprint = normalizeFingerprint(key.fingerprint);
    keyring.set(fingerprint, { ...key, fingerprint });
  }

  function importKey(key: InMemoryKey) {
    const fingerprint = normalizeFingerprint(key.fingerprint);
    const existing = keyring.get(fingerprint);
    keyring.set(fingerprint, {
      ...key,
      fingerprint,
      hasSecret: key.hasSecret || (existing?.hasSecret ?? false),
    });
  }

  return {
    importKey,

    deleteSecretKey(fingerprint: string) {
      const key = keyring.get(normalizeFingerprint(fingerprint));
      if (!key?.hasSecret) return false;
      keyring.set(key.fingerprint, { ...key, hasSecret: false });
      return true;
    },

    async encrypt(plaintext, recipients) {
      if (recipients.length === 0) {
        return { ok: false, status: "no recipients specified" };
      }
      const unknown = recipients.find(
        (fingerprint) => !keyring.has(normalizeFingerprint(fingerprint)),
      );
      if (unknown !== undefined) {
        return { ok: false, status: `invalid recipient: ${unknown}` };
      }
      const payload = JSON.stringify({
        to: recipients.map(normalizeFingerprint),
        nonce: randomUUID(),
        data: Buffer.from(plaintext).toString("base64"),
      });
      return {
        ok: true,
        ciphertext: `${ARMOR_HEADER}\n${Buffer.from(payload).toString("base64")}\n${ARMOR_FOOTER}`,
      };
    },

    async decrypt(ciphertext) {
      const armored = ARMOR_RE.exec(ciphertext.trim());
      if (!armored?.[1]) {
        return { ok: false, status: "no valid message data found" };
      }
      let message: z.infer<typeof messageSchema>;
      try {
        message = messageSchema.parse(
          JSON.parse(Buffer.from(armored[1], "base64").toString("utf8")),
        );
      } catch {
        return { ok: false, status: "corrupt message" };
      }
      const canOpen = message.to.some(
        (fingerprint) => keyring.get(fingerprint)?.hasSecret === true,
      );
      if (!canOpen) {
        return { ok: false, status: "decryption failed: no secret key" };
      }
      return {
        ok: true,
        plaintext: new Uint8Array(Buffer.from(message.data, "base64")),
      };
    },

    async listLocalKeys() {
      const keys = new Map<string, LocalKeyInfo>();
      for (const key of keyring.values()) {
        keys.set(key.fingerprint, {
          algorithm: key.algorithm,
          identities: [...key.identities],
          hasSecret: key.hasSecret,
        });
      }
      return keys;
    },

    async fetchKeys(keyserverUrl, fingerprints) {
      const served = options?.keyservers?.[keyserverUrl];
      if (!served) {
        throw new Error(`Keyserver ${keyserverUrl} is unreachable`);
      }
      const imported: string[] = [];
      const results: KeyImportStatus[] = [];
      for (const fingerprint of fingerprints) {
        const key = served.find(
          (candidate) =>
            normalizeFingerprint(candidate.fingerprint) === normalizeFingerprint(fingerprint),
        );
        if (!key) {
          results.push({
            fingerprint,
            ok: false,
            problem: "not found",
            text: "No key found on keyserver",
          });
          continue;
        }
        importKey({ ...key, hasSecret: false });
        imported.push(fingerprint);
        results.push({ fingerprint, ok: true });
      }
      return { fingerprints: imported, results };
    },
  };
}
