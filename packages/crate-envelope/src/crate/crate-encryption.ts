import type { CrateEncryptionConfig } from "../config.js";
import { createEnvelopeAggregator } from "../envelope/envelope.aggregator.js";
import { createEnvelopeDecoder } from "../envelope/envelope.decoder.js";
import {
  buildRecipientDescriptors,
  createEnvelopeEncoder,
} from "../envelope/envelope.encoder.js";
import {
  parseCrateDocument,
  serializeCrateDocument,
  type CrateDocument,
} from "../graph/crate-document.js";
import type { PlainEntity, SensitiveEntity } from "../graph/entities.js";
import type { MetadataGraph } from "../graph/metadata-graph.js";
import { isKeyholder, retrieveKeyholderKeys } from "../keyholders/keyholder.js";
import { createLogger } from "../logger.js";
import { createRecipientResolver } from "../recipients/recipient.resolver.js";
import type { EncryptionBackend, JsonValue, Logger } from "../types.js";

export type CrateEncryptionOptions = {
  backend: EncryptionBackend;
  logger?: Logger;
  /** Keys every sensitive entity of the crate is encrypted for, in addition to its own. */
  defaultFingerprints?: readonly string[];
  /** Skip recipients without keys instead of failing. */
  allowMissing?: boolean;
  /** Keyserver asked for keyholders that do not name their own. */
  keyserver?: string;
  generateId?: () => string;
  actionType?: string;
};

export type OpenedCrate = {
  context: JsonValue;
  graph: MetadataGraph;
  decrypted: SensitiveEntity[];
};

export interface CrateEncryption {
  seal(
    graph: MetadataGraph,
    options?: { context?: JsonValue },
  ): Promise<CrateDocument>;
  open(document: unknown): Promise<OpenedCrate>;
  /**
   * Fetches the keys of every keyholder in the graph from its keyserver.
   *
   * @returns the fingerprints imported into the backend
   */
  retrieveKeys(graph: MetadataGraph): Promise<string[]>;
}

/**
 * Creates the crate-level encryption pipeline.
 *
 * `seal` renders a graph to a metadata document with every sensitive entity
 * moved into envelopes; envelopes the current reader could not open are
 * carried over unchanged. `open` reads a document and decrypts what it can.
 *
 * @example
 * ```typescript
 * const crypt = createCrateEncryption({ backend, logger });
 * const document = await crypt.seal(graph);
 * const { graph: reopened } = await crypt.open(document);
 * ```
 */
export function createCrateEncryption(
  deps: CrateEncryptionOptions,
): CrateEncryption {
  const encoder = createEnvelopeEncoder({
    backend: deps.backend,
    logger: deps.logger,
    generateId: deps.generateId,
    actionType: deps.actionType,
  });
  const decoder = createEnvelopeDecoder({
    backend: deps.backend,
    logger: deps.logger,
  });

  return {
    async seal(graph, options) {
      const resolver = createRecipientResolver({
        graph,
        defaultFingerprints: deps.defaultFingerprints,
        logger: deps.logger,
      });
      const aggregator = createEnvelopeAggregator({
        resolver,
        resolveOptions: { allowMissing: deps.allowMissing ?? false },
      });

      const groups = aggregator.aggregate(graph.getSensitiveEntities());
      const { envelopes } = await encoder.encode(groups);
      const retained = graph.getEnvelopes();
      const allEnvelopes = [...envelopes, ...retained];

      deps.logger?.debug?.(
        {
          groups: groups.length,
          envelopes: envelopes.length,
          retained: retained.length,
        },
        "Sealed crate",
      );

      const entities = graph
        .getEntities()
        .filter((entity): entity is PlainEntity => entity.kind === "plain");
      return serializeCrateDocument({
        context: options?.context,
        entities,
        envelopes: allEnvelopes,
        descriptors: buildRecipientDescriptors(allEnvelopes),
      });
    },

    async open(document) {
      const { context, graph } = parseCrateDocument(document);
      const decrypted = await decoder.decode(graph);
      return { context, graph, decrypted };
    },

    async retrieveKeys(graph) {
      const imported: string[] = [];
      for (const keyholder of graph.getEntities().filter(isKeyholder)) {
        const fingerprints = await retrieveKeyholderKeys(keyholder, {
          backend: deps.backend,
          logger: deps.logger,
          defaultKeyserver: deps.keyserver,
        });
        imported.push(...(fingerprints ?? []));
      }
      return imported;
    },
  };
}

/**
 * Builds the pipeline from loaded configuration. Without a logger of its own
 * the pipeline logs through a pino logger at the configured level.
 */
export function createCrateEncryptionFromConfig(
  config: CrateEncryptionConfig,
  deps: Pick<CrateEncryptionOptions, "backend" | "logger" | "generateId">,
): CrateEncryption {
  return createCrateEncryption({
    ...deps,
    logger: deps.logger ?? createLogger({ level: config.logLevel }),
    defaultFingerprints: config.defaultFingerprints,
    allowMissing: config.allowMissing,
    keyserver: config.keyserver,
  });
}
