export type Logger = {
  info: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  warn?: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
};

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * JSON-LD node reference, the only way entities point at each other.
 */
export type EntityReference = { "@id": string };

/**
 * A public key as it is written into the crate.
 * `identities` are the raw user ids of the key ("Name <mail@host>").
 */
export type KeyIdentity = {
  algorithm: string;
  fingerprint: string;
  identities: string[];
};

export type LocalKeyInfo = {
  algorithm: string;
  identities: string[];
  hasSecret: boolean;
};

export type EncryptResult =
  | { ok: true; ciphertext: string }
  | { ok: false; status: string };

export type DecryptResult =
  | { ok: true; plaintext: Uint8Array }
  | { ok: false; status: string };

export type KeyImportStatus = {
  fingerprint: string;
  ok: boolean;
  problem?: string;
  text?: string;
};

export type KeyImportResult = {
  fingerprints: string[];
  results: KeyImportStatus[];
};

/**
 * Asymmetric encryption backend the envelope pipeline delegates to.
 * Failures are returned, not thrown, so callers decide whether they are fatal.
 */
export interface EncryptionBackend {
  encrypt(
    plaintext: Uint8Array,
    recipients: readonly string[],
  ): Promise<EncryptResult>;
  decrypt(ciphertext: string): Promise<DecryptResult>;
  listLocalKeys(): Promise<Map<string, LocalKeyInfo>>;
  fetchKeys(
    keyserverUrl: string,
    fingerprints: readonly string[],
  ): Promise<KeyImportResult>;
}
