import type {
  EntityReference,
  JsonObject,
  JsonValue,
  KeyIdentity,
} from "../types.js";

export const RECIPIENTS_PROPERTY = "recipients";
export const FINGERPRINTS_PROPERTY = "pubkey_fingerprints";

export const DEFAULT_ACTION_TYPE = "SendAction";
export const ENVELOPE_TYPE = "EncryptedGraphMessage";
export const OPENPGP_DELIVERY_METHOD = "https://doi.org/10.17487/RFC4880";
export const AUDIENCE_TYPE = "Audience";

export type PlainEntity = {
  kind: "plain";
  id: string;
  properties: JsonObject;
};

/**
 * An entity whose properties are only written to the crate encrypted.
 * `recipients` and `pubkey_fingerprints` in its properties decide who can read it.
 */
export type SensitiveEntity = {
  kind: "sensitive";
  id: string;
  properties: JsonObject;
};

export type EnvelopeRecord = {
  kind: "envelope";
  id: string;
  actionType: string;
  ciphertext: string;
  recipients: KeyIdentity[];
  deliveryMethod: string;
  properties: JsonObject;
};

export type RecipientDescriptor = {
  kind: "recipient";
  id: string;
  algorithm: string;
  fingerprints: string[];
  identities: string[];
  envelopeIds: string[];
  properties: JsonObject;
};

export type GraphEntity =
  | PlainEntity
  | SensitiveEntity
  | EnvelopeRecord
  | RecipientDescriptor;

function withoutId(properties: JsonObject | undefined): JsonObject {
  const source: JsonObject = properties ?? {};
  const { "@id": _id, ...rest } = source;
  return rest;
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

export function createPlainEntity(
  id: string,
  properties?: JsonObject,
): PlainEntity {
  return { kind: "plain", id, properties: withoutId(properties) };
}

export function createSensitiveEntity(
  id: string,
  properties?: JsonObject,
  fingerprints?: string | string[],
): SensitiveEntity {
  const entity: SensitiveEntity = {
    kind: "sensitive",
    id,
    properties: withoutId(properties),
  };
  if (fingerprints !== undefined) {
    addSensitiveKeys(entity, fingerprints);
  }
  return entity;
}

/**
 * Adds explicit key fingerprints to a sensitive entity, dropping duplicates.
 */
export function addSensitiveKeys(
  entity: SensitiveEntity,
  fingerprints: string | string[],
): void {
  const added = typeof fingerprints === "string" ? [fingerprints] : fingerprints;
  const current = toStringList(entity.properties[FINGERPRINTS_PROPERTY]);
  entity.properties[FINGERPRINTS_PROPERTY] = unique([...current, ...added]);
}

export function getProperty(
  entity: GraphEntity,
  name: string,
): JsonValue | undefined {
  return entity.properties[name];
}

export function setProperty(
  entity: GraphEntity,
  name: string,
  value: JsonValue,
): void {
  entity.properties[name] = value;
}

/**
 * Appends to a multi-valued property. A single existing value becomes a list.
 */
export function appendTo(
  entity: GraphEntity,
  name: string,
  value: JsonValue,
): void {
  const current = entity.properties[name];
  if (current === undefined || current === null) {
    entity.properties[name] = [value];
  } else if (Array.isArray(current)) {
    current.push(value);
  } else {
    entity.properties[name] = [current, value];
  }
}

export function appendReference(
  entity: GraphEntity,
  name: string,
  target: GraphEntity,
): void {
  appendTo(entity, name, toReference(target));
}

export function toReference(entity: GraphEntity): EntityReference {
  return { "@id": entity.id };
}

/**
 * Collects entity ids from a property holding references, bare ids or lists of either.
 */
export function toReferences(value: JsonValue | undefined): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.flatMap((item) => toReferences(item));
  if (typeof value === "object") {
    const id = value["@id"];
    return typeof id === "string" ? [id] : [];
  }
  return [];
}

export function toStringList(value: JsonValue | undefined): string[] {
  if (typeof value === "string") return value === "" ? [] : [value];
  if (Array.isArray(value)) {
    return value.filter(
      (item): item is string => typeof item === "string" && item !== "",
    );
  }
  return [];
}

export function getTypes(properties: JsonObject): string[] {
  return toStringList(properties["@type"]);
}

export function toJsonLd(entity: PlainEntity | SensitiveEntity): JsonObject {
  return { "@id": entity.id, ...withoutId(entity.properties) };
}
