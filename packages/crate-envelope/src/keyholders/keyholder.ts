import { InvalidParameterError, KeyserverWarning } from "../errors.js";
import {
  FINGERPRINTS_PROPERTY,
  createPlainEntity,
  getTypes,
  toStringList,
  type GraphEntity,
  type PlainEntity,
} from "../graph/entities.js";
import { hasValidContact, parseIdentity } from "../identity/key-identity.js";
import type {
  EncryptionBackend,
  JsonObject,
  KeyIdentity,
  KeyImportResult,
  Logger,
} from "../types.js";

export const HKP_INDEX_PATH = "/pks/lookup?op=index&exact=true&search=";
export const KEYHOLDER_TYPES = ["ContactPoint", "EncryptionKeyholder"];

export function isKeyholder(entity: GraphEntity): entity is PlainEntity {
  return (
    entity.kind === "plain" &&
    getTypes(entity.properties).includes("EncryptionKeyholder")
  );
}

export function keyserverIndexUrl(keyserver: string, fingerprint: string) {
  return `${keyserver}${HKP_INDEX_PATH}${fingerprint}`;
}

/**
 * Creates the plaintext entity that publishes a recipient's key.
 * Sensitive entities point at keyholders through their `recipients` property.
 */
export function createKeyholder(params: {
  key?: KeyIdentity;
  keyserver?: string;
  id?: string;
  properties?: JsonObject;
}): PlainEntity {
  const { key, keyserver } = params;
  let id = params.id;
  if (!id) {
    if (!key) {
      throw new InvalidParameterError(
        "No valid identifier combination supplied for keyholder",
        "id",
        params.id,
      );
    }
    id = keyserver
      ? keyserverIndexUrl(keyserver, key.fingerprint)
      : `#${key.fingerprint}`;
  }

  const properties: JsonObject = {
    "@type": [...KEYHOLDER_TYPES],
    ...params.properties,
  };
  if (key) {
    const parsed = key.identities.map((uid) => parseIdentity(uid));
    properties[FINGERPRINTS_PROPERTY] = key.fingerprint;
    properties.name = parsed.map((identity) => identity.name);
    properties.email = parsed
      .filter((identity) => hasValidContact(identity))
      .map((identity) => identity.email);
  }
  if (keyserver) {
    properties.keyserver = keyserver;
    if (key) properties.url = keyserverIndexUrl(keyserver, key.fingerprint);
  }
  return createPlainEntity(id, properties);
}

/**
 * Asks the keyholder's keyserver, or `defaultKeyserver` when it names none,
 * for its keys. Best effort: problems are reported as warnings and never
 * abort the caller.
 *
 * @returns the imported fingerprints, or null when nothing was fetched
 */
export async function retrieveKeyholderKeys(
  keyholder: PlainEntity,
  deps: {
    backend: EncryptionBackend;
    logger?: Logger;
    defaultKeyserver?: string;
    onWarning?: (warning: KeyserverWarning) => void;
  },
): Promise<string[] | null> {
  const fingerprints = toStringList(keyholder.properties[FINGERPRINTS_PROPERTY]);
  const keyserver =
    typeof keyholder.properties.keyserver === "string"
      ? keyholder.properties.keyserver
      : deps.defaultKeyserver;
  if (fingerprints.length === 0 || keyserver === undefined) {
    return null;
  }

  function report(warning: KeyserverWarning) {
    deps.logger?.warn?.(
      {
        keyholder: keyholder.id,
        keyserver,
        fingerprint: warning.fingerprint,
        status: warning.status,
      },
      warning.message,
    );
    deps.onWarning?.(warning);
  }

  let imported: KeyImportResult;
  try {
    imported = await deps.backend.fetchKeys(keyserver, fingerprints);
  } catch (error) {
    report(
      new KeyserverWarning(
        `Keyserver lookup failed: ${error instanceof Error ? error.message : String(error)}`,
        keyserver,
      ),
    );
    return null;
  }

  if (imported.results.length === 0) {
    return null;
  }
  for (const result of imported.results) {
    if (result.problem) {
      report(
        new KeyserverWarning(
          `Invalid response from keyserver for key ${result.fingerprint}: ${result.text ?? result.problem}`,
          keyserver,
          result.fingerprint,
          result.problem,
        ),
      );
    }
  }
  return imported.fingerprints;
}
