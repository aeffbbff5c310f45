import { randomUUID } from "node:crypto";
import { BackendFailureError } from "../errors.js";
import {
  DEFAULT_ACTION_TYPE,
  OPENPGP_DELIVERY_METHOD,
  toJsonLd,
  type EnvelopeRecord,
  type RecipientDescriptor,
} from "../graph/entities.js";
import {
  keyIdentityFromLocalKey,
  normalizeFingerprint,
  primaryIdentity,
} from "../identity/key-identity.js";
import type { EncryptionBackend, LocalKeyInfo, Logger } from "../types.js";
import type { RecipientGroup } from "./envelope.aggregator.js";

export type EncodeResult = {
  envelopes: EnvelopeRecord[];
  descriptors: RecipientDescriptor[];
};

export interface EnvelopeEncoder {
  encode(groups: readonly RecipientGroup[]): Promise<EncodeResult>;
}

export function generateEnvelopeId(): string {
  return `#${randomUUID()}`;
}

/**
 * Serialises the members of a group into the plaintext of its envelope:
 * a JSON array of the members' JSON-LD objects, in group order.
 */
export function serializeGroup(group: RecipientGroup): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(group.members.map(toJsonLd)));
}

/**
 * Builds one descriptor per recipient identity, each linked back to every
 * envelope addressed to one of its keys.
 */
export function buildRecipientDescriptors(
  envelopes: readonly EnvelopeRecord[],
): RecipientDescriptor[] {
  const descriptors = new Map<string, RecipientDescriptor>();
  for (const envelope of envelopes) {
    for (const key of envelope.recipients) {
      const id = primaryIdentity(key);
      let descriptor = descriptors.get(id);
      if (!descriptor) {
        descriptor = {
          kind: "recipient",
          id,
          algorithm: key.algorithm,
          fingerprints: [],
          identities: [],
          envelopeIds: [],
          properties: {},
        };
        descriptors.set(id, descriptor);
      }
      if (!descriptor.fingerprints.includes(key.fingerprint)) {
        descriptor.fingerprints.push(key.fingerprint);
      }
      for (const identity of key.identities) {
        if (identity.trim() === "") continue;
        if (!descriptor.identities.includes(identity)) {
          descriptor.identities.push(identity);
        }
      }
      if (!descriptor.envelopeIds.includes(envelope.id)) {
        descriptor.envelopeIds.push(envelope.id);
      }
    }
  }
  return Array.from(descriptors.values());
}

async function listNormalizedKeys(
  backend: EncryptionBackend,
): Promise<Map<string, LocalKeyInfo>> {
  const keys = new Map<string, LocalKeyInfo>();
  for (const [fingerprint, info] of await backend.listLocalKeys()) {
    keys.set(normalizeFingerprint(fingerprint), info);
  }
  return keys;
}

export function createEnvelopeEncoder(deps: {
  backend: EncryptionBackend;
  logger?: Logger;
  generateId?: () => string;
  actionType?: string;
}): EnvelopeEncoder {
  const generateId = deps.generateId ?? generateEnvelopeId;

  return {
    async encode(groups) {
      if (groups.length === 0) {
        return { envelopes: [], descriptors: [] };
      }
      const localKeys = await listNormalizedKeys(deps.backend);
      const envelopes: EnvelopeRecord[] = [];

      for (const group of groups) {
        const result = await deps.backend.encrypt(
          serializeGroup(group),
          group.fingerprints,
        );
        if (!result.ok) {
          deps.logger?.error(
            {
              fingerprints: group.fingerprints,
              members: group.members.map((member) => member.id),
              status: result.status,
            },
            "Failed to encrypt envelope",
          );
          throw new BackendFailureError(
            `Unable to encrypt ${group.members.length} entities for ${group.fingerprints.join(", ")}: ${result.status}`,
            "encrypt",
            result.status,
            group.fingerprints,
          );
        }
        const envelope: EnvelopeRecord = {
          kind: "envelope",
          id: generateId(),
          actionType: deps.actionType ?? DEFAULT_ACTION_TYPE,
          ciphertext: result.ciphertext,
          recipients: group.fingerprints.map((raw) => {
            const fingerprint = normalizeFingerprint(raw);
            return keyIdentityFromLocalKey(fingerprint, localKeys.get(fingerprint));
          }),
          deliveryMethod: OPENPGP_DELIVERY_METHOD,
          properties: {},
        };
        deps.logger?.debug?.(
          {
            envelopeId: envelope.id,
            fingerprints: group.fingerprints,
            members: group.members.length,
          },
          "Encrypted envelope",
        );
        envelopes.push(envelope);
      }

      return { envelopes, descriptors: buildRecipientDescriptors(envelopes) };
    },
  };
}
