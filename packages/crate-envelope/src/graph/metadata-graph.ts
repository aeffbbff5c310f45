import type {
  EnvelopeRecord,
  GraphEntity,
  SensitiveEntity,
} from "./entities.js";

/**
 * Arena of crate entities keyed by id. Entities reference each other by id
 * only, so the graph serialises without cycles and can be reloaded in part.
 */
export interface MetadataGraph {
  getEntities(): GraphEntity[];
  dereference(id: string): GraphEntity | null;
  /** Inserts the entity, or replaces the one with the same id in place. */
  add<T extends GraphEntity>(entity: T): T;
  remove(id: string): boolean;
  getSensitiveEntities(): SensitiveEntity[];
  getEnvelopes(): EnvelopeRecord[];
}

export function createMetadataGraph(
  entities: Iterable<GraphEntity> = [],
): MetadataGraph {
  const store = new Map<string, GraphEntity>();
  for (const entity of entities) {
    store.set(entity.id, entity);
  }

  return {
    getEntities() {
      return Array.from(store.values());
    },

    dereference(id: string) {
      return store.get(id) ?? null;
    },

    add(entity) {
      store.set(entity.id, entity);
      return entity;
    },

    remove(id: string) {
      return store.delete(id);
    },

    getSensitiveEntities() {
      const result: SensitiveEntity[] = [];
      for (const entity of store.values()) {
        if (entity.kind === "sensitive") result.push(entity);
      }
      return result;
    },

    getEnvelopes() {
      const result: EnvelopeRecord[] = [];
      for (const entity of store.values()) {
        if (entity.kind === "envelope") result.push(entity);
      }
      return result;
    },
  };
}
