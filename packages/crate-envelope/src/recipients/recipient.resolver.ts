import { MissingMemberError, NoValidKeysError } from "../errors.js";
import {
  FINGERPRINTS_PROPERTY,
  RECIPIENTS_PROPERTY,
  toReferences,
  toStringList,
  type SensitiveEntity,
} from "../graph/entities.js";
import type { MetadataGraph } from "../graph/metadata-graph.js";
import { normalizeFingerprint } from "../identity/key-identity.js";
import type { Logger } from "../types.js";

export type ResolveOptions = {
  allowMissing?: boolean;
};

export interface RecipientResolver {
  /**
   * Returns the sorted, de-duplicated fingerprints the entity must be
   * encrypted for, in their normalised form.
   */
  resolve(entity: SensitiveEntity, options?: ResolveOptions): string[];
}

/**
 * Resolves recipient fingerprints from the entity's own keys, one level of
 * referenced recipient entities, and the crate-wide default fingerprints.
 * Defaults are always unioned in, not only used when nothing else resolves.
 */
export function createRecipientResolver(deps: {
  graph: MetadataGraph;
  defaultFingerprints?: readonly string[];
  logger?: Logger;
}): RecipientResolver {
  const defaults = (deps.defaultFingerprints ?? []).map(normalizeFingerprint);

  return {
    resolve(entity, options) {
      const allowMissing = options?.allowMissing ?? false;
      const fingerprints = new Set(
        toStringList(entity.properties[FINGERPRINTS_PROPERTY]).map(
          normalizeFingerprint,
        ),
      );
      const missingMembers: string[] = [];

      for (const recipientId of toReferences(
        entity.properties[RECIPIENTS_PROPERTY],
      )) {
        const recipient = deps.graph.dereference(recipientId);
        const keys = recipient
          ? toStringList(recipient.properties[FINGERPRINTS_PROPERTY])
          : [];
        if (keys.length === 0) {
          missingMembers.push(recipientId);
          continue;
        }
        for (const key of keys) fingerprints.add(normalizeFingerprint(key));
      }

      for (const key of defaults) fingerprints.add(key);

      if (missingMembers.length > 0) {
        if (!allowMissing) {
          throw new MissingMemberError(entity.id, missingMembers);
        }
        deps.logger?.warn?.(
          { entityId: entity.id, missingMembers },
          "Recipients without usable keys skipped",
        );
      }

      if (fingerprints.size === 0) {
        throw new NoValidKeysError(entity.id, missingMembers);
      }

      return Array.from(fingerprints).sort();
    },
  };
}
