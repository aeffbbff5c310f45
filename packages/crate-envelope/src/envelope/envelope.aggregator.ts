import type { SensitiveEntity } from "../graph/entities.js";
import type {
  RecipientResolver,
  ResolveOptions,
} from "../recipients/recipient.resolver.js";

export type RecipientGroup = {
  /** Sorted and de-duplicated; the aggregation key. */
  fingerprints: string[];
  members: SensitiveEntity[];
};

export interface EnvelopeAggregator {
  aggregate(entities: readonly SensitiveEntity[]): RecipientGroup[];
}

export function createEnvelopeAggregator(deps: {
  resolver: RecipientResolver;
  resolveOptions?: ResolveOptions;
}): EnvelopeAggregator {
  return {
    aggregate(entities) {
      // Map keeps groups in order of first discovery
      const groups = new Map<string, RecipientGroup>();
      for (const entity of entities) {
        const fingerprints = deps.resolver.resolve(entity, deps.resolveOptions);
        const groupKey = fingerprints.join("\n");
        const group = groups.get(groupKey);
        if (group) {
          group.members.push(entity);
        } else {
          groups.set(groupKey, { fingerprints, members: [entity] });
        }
      }
      return Array.from(groups.values());
    },
  };
}
