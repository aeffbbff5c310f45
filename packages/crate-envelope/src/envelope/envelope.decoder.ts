import { InvalidEnvelopeError } from "../errors.js";
import { envelopeFragmentSchema } from "../graph/document.schema.js";
import {
  createSensitiveEntity,
  type SensitiveEntity,
} from "../graph/entities.js";
import type { MetadataGraph } from "../graph/metadata-graph.js";
import type { EncryptionBackend, Logger } from "../types.js";

export interface EnvelopeDecoder {
  /**
   * Opens every envelope in the graph that a local key can decrypt and merges
   * its entities into the graph. Envelopes that cannot be opened stay in the
   * graph untouched and contribute nothing.
   */
  decode(graph: MetadataGraph): Promise<SensitiveEntity[]>;
}

/**
 * Turns the plaintext of an envelope back into sensitive entities.
 */
export function parseEnvelopeFragment(
  envelopeId: string,
  plaintext: Uint8Array,
): SensitiveEntity[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(plaintext));
  } catch (error) {
    throw new InvalidEnvelopeError(
      `Envelope "${envelopeId}" does not contain JSON`,
      "JSON array of entities",
      "text",
      error instanceof Error ? error : undefined,
    );
  }
  const result = envelopeFragmentSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidEnvelopeError(
      `Envelope "${envelopeId}" does not contain a list of entities: ${result.error.message}`,
      "JSON array of entities",
      Array.isArray(parsed) ? "array" : typeof parsed,
    );
  }
  return result.data.map((node) => {
    const { "@id": id, ...properties } = node;
    return createSensitiveEntity(String(id), properties);
  });
}

export function createEnvelopeDecoder(deps: {
  backend: EncryptionBackend;
  logger?: Logger;
}): EnvelopeDecoder {
  return {
    async decode(graph) {
      const opened: { envelopeId: string; entities: SensitiveEntity[] }[] = [];
      for (const envelope of graph.getEnvelopes()) {
        const result = await deps.backend.decrypt(envelope.ciphertext);
        if (!result.ok) {
          deps.logger?.debug?.(
            { envelopeId: envelope.id, status: result.status },
            "No local key opens envelope, skipping",
          );
          continue;
        }
        opened.push({
          envelopeId: envelope.id,
          entities: parseEnvelopeFragment(envelope.id, result.plaintext),
        });
      }

      // Every fragment parsed, so the graph is changed all at once or not at all
      const decoded: SensitiveEntity[] = [];
      for (const { envelopeId, entities } of opened) {
        graph.remove(envelopeId);
        for (const entity of entities) {
          graph.add(entity);
          decoded.push(entity);
        }
        deps.logger?.info(
          { envelopeId, entities: entities.map((entity) => entity.id) },
          "Decrypted envelope",
        );
      }
      return decoded;
    },
  };
}
