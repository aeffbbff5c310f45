import { InvalidEnvelopeError } from "../errors.js";
import {
  hasValidContact,
  parseIdentity,
  primaryIdentity,
} from "../identity/key-identity.js";
import type { JsonObject, JsonValue, KeyIdentity } from "../types.js";
import {
  crateDocumentSchema,
  jsonObjectSchema,
  persistedEnvelopeSchema,
} from "./document.schema.js";
import {
  AUDIENCE_TYPE,
  DEFAULT_ACTION_TYPE,
  ENVELOPE_TYPE,
  FINGERPRINTS_PROPERTY,
  OPENPGP_DELIVERY_METHOD,
  createPlainEntity,
  getTypes,
  toJsonLd,
  toReferences,
  toStringList,
  type EnvelopeRecord,
  type GraphEntity,
  type PlainEntity,
  type RecipientDescriptor,
} from "./entities.js";
import { createMetadataGraph, type MetadataGraph } from "./metadata-graph.js";

export const DEFAULT_CRATE_CONTEXT = "https://w3id.org/ro/crate/1.1/context";
export const ENCRYPTED_FIELD = "@encrypted";
export const AUDIENCE_DESCRIPTION = "encrypted message recipients";

export type CrateDocument = {
  "@context": JsonValue;
  "@graph": JsonObject[];
  "@encrypted"?: JsonObject[];
};

const ENVELOPE_FIELDS = new Set([
  "@id",
  "@type",
  "deliveryMethod",
  "recipients",
  "encryptedGraph",
]);

function toAudienceKeys(audience: JsonObject, id: string): KeyIdentity[] {
  const fingerprints = toStringList(audience[FINGERPRINTS_PROPERTY]);
  const extraIdentities = toStringList(audience.identifier);
  const algorithm =
    typeof audience.pubkey_algorithm === "string"
      ? audience.pubkey_algorithm
      : "unknown";
  // A key without user ids is published under its fingerprint
  const identities =
    fingerprints.includes(id) && extraIdentities.length === 0
      ? []
      : [id, ...extraIdentities];
  return fingerprints.map((fingerprint) => ({
    algorithm,
    fingerprint,
    identities,
  }));
}

/**
 * An Audience node written by `serializeDescriptor`: marked with the
 * recipients description and linked to at least one envelope of the document.
 * Any other Audience is user data.
 */
function isRecipientDescriptor(
  node: JsonObject,
  envelopeIds: ReadonlySet<string>,
): boolean {
  return (
    getTypes(node).includes(AUDIENCE_TYPE) &&
    node.audienceType === AUDIENCE_DESCRIPTION &&
    toReferences(node.action).some((id) => envelopeIds.has(id))
  );
}

function parseEnvelope(
  item: unknown,
  audiences: Map<string, JsonObject>,
): EnvelopeRecord {
  const shape = persistedEnvelopeSchema.safeParse(item);
  if (!shape.success) {
    throw new InvalidEnvelopeError(
      `Malformed encrypted graph message: ${shape.error.message}`,
      "EncryptedGraphMessage",
      typeof item,
    );
  }
  const node = jsonObjectSchema.safeParse(item);
  if (!node.success) {
    throw new InvalidEnvelopeError(
      `Encrypted graph message "${shape.data["@id"]}" holds non-JSON values: ${node.error.message}`,
      "EncryptedGraphMessage",
      typeof item,
    );
  }
  const envelope = shape.data;
  const types =
    typeof envelope["@type"] === "string"
      ? [envelope["@type"]]
      : envelope["@type"];
  const recipientRefs = Array.isArray(envelope.recipients)
    ? envelope.recipients
    : [envelope.recipients];

  const properties: JsonObject = {};
  for (const [key, value] of Object.entries(node.data)) {
    if (!ENVELOPE_FIELDS.has(key)) properties[key] = value;
  }

  return {
    kind: "envelope",
    id: envelope["@id"],
    actionType:
      types.find((type) => type !== ENVELOPE_TYPE) ?? DEFAULT_ACTION_TYPE,
    ciphertext: envelope.encryptedGraph,
    recipients: recipientRefs.flatMap((ref) => {
      const audience = audiences.get(ref["@id"]);
      if (!audience) {
        return [
          { algorithm: "unknown", fingerprint: ref["@id"], identities: [] },
        ];
      }
      return toAudienceKeys(audience, ref["@id"]);
    }),
    deliveryMethod: envelope.deliveryMethod ?? OPENPGP_DELIVERY_METHOD,
    properties,
  };
}

/**
 * Reads a crate metadata document into a graph. Envelopes become envelope
 * entities; recipient descriptors are folded into the envelopes' recipient
 * keys since they are regenerated whenever the crate is sealed again.
 */
export function parseCrateDocument(input: unknown): {
  context: JsonValue;
  graph: MetadataGraph;
} {
  const document = crateDocumentSchema.safeParse(input);
  if (!document.success) {
    throw new InvalidEnvelopeError(
      `Crate metadata must have a @context and a @graph: ${document.error.message}`,
      "{ @context, @graph, @encrypted? }",
      typeof input,
    );
  }

  const encrypted = document.data[ENCRYPTED_FIELD] ?? [];
  const envelopeIds = new Set<string>();
  for (const item of encrypted) {
    const shape = persistedEnvelopeSchema.safeParse(item);
    if (shape.success) envelopeIds.add(shape.data["@id"]);
  }

  const entities: GraphEntity[] = [];
  const audiences = new Map<string, JsonObject>();
  for (const node of document.data["@graph"]) {
    const { "@id": id, ...properties } = node;
    if (isRecipientDescriptor(node, envelopeIds)) {
      audiences.set(String(id), node);
    } else {
      entities.push(createPlainEntity(String(id), properties));
    }
  }
  for (const item of encrypted) {
    entities.push(parseEnvelope(item, audiences));
  }

  return {
    context: document.data["@context"],
    graph: createMetadataGraph(entities),
  };
}

export function serializeEnvelope(envelope: EnvelopeRecord): JsonObject {
  const recipientIds = Array.from(
    new Set(envelope.recipients.map((key) => primaryIdentity(key))),
  );
  return {
    "@id": envelope.id,
    "@type": [envelope.actionType, ENVELOPE_TYPE],
    actionStatus: "PotentialActionStatus",
    ...envelope.properties,
    deliveryMethod: envelope.deliveryMethod,
    recipients: recipientIds.map((id) => ({ "@id": id })),
    encryptedGraph: envelope.ciphertext,
  };
}

export function serializeDescriptor(descriptor: RecipientDescriptor): JsonObject {
  const node: JsonObject = {
    "@id": descriptor.id,
    "@type": AUDIENCE_TYPE,
    audienceType: AUDIENCE_DESCRIPTION,
  };
  const [primary, ...others] = descriptor.identities;
  if (primary !== undefined) {
    const parsed = parseIdentity(primary);
    node.name = parsed.name;
    if (hasValidContact(parsed)) node.email = parsed.email;
  }
  node[FINGERPRINTS_PROPERTY] =
    descriptor.fingerprints.length === 1
      ? descriptor.fingerprints[0] ?? null
      : descriptor.fingerprints;
  node.pubkey_algorithm = descriptor.algorithm;
  if (others.length > 0) node.identifier = others;
  node.action = descriptor.envelopeIds.map((id) => ({ "@id": id }));
  return { ...node, ...descriptor.properties };
}

export function serializeCrateDocument(input: {
  context?: JsonValue;
  entities: readonly PlainEntity[];
  envelopes: readonly EnvelopeRecord[];
  descriptors: readonly RecipientDescriptor[];
}): CrateDocument {
  const document: CrateDocument = {
    "@context": input.context ?? DEFAULT_CRATE_CONTEXT,
    "@graph": [
      ...input.entities.map(toJsonLd),
      ...input.descriptors.map(serializeDescriptor),
    ],
  };
  if (input.envelopes.length > 0) {
    document[ENCRYPTED_FIELD] = input.envelopes.map(serializeEnvelope);
  }
  return document;
}
