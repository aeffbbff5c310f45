import { describe, expect, it, vi } from "vitest";
import { createInMemoryBackend } from "../backends/inmemory-backend.js";
import { InvalidEnvelopeError } from "../errors.js";
import {
  OPENPGP_DELIVERY_METHOD,
  createPlainEntity,
  type EnvelopeRecord,
} from "../graph/entities.js";
import { createMetadataGraph } from "../graph/metadata-graph.js";
import { createEnvelopeDecoder, parseEnvelopeFragment } from "./envelope.decoder.js";

const encoder = new TextEncoder();

describe("Feature: Envelope Decoder", () => {
  function setup() {
    const backend = createInMemoryBackend({
      keys: [
        { algorithm: "eddsa", fingerprint: "AAAA", identities: [], hasSecret: true },
        { algorithm: "eddsa", fingerprint: "BBBB", identities: [], hasSecret: false },
      ],
    });
    const logger = { info: vi.fn(), error: vi.fn(), debug: vi.fn() };
    return { backend, logger, decoder: createEnvelopeDecoder({ backend, logger }) };
  }

  async function seal(
    backend: ReturnType<typeof createInMemoryBackend>,
    id: string,
    fingerprints: string[],
    plaintext: string,
  ): Promise<EnvelopeRecord> {
    const result = await backend.encrypt(encoder.encode(plaintext), fingerprints);
    if (!result.ok) throw new Error(result.status);
    return {
      kind: "envelope",
      id,
      actionType: "SendAction",
      ciphertext: result.ciphertext,
      recipients: fingerprints.map((fingerprint) => ({
        algorithm: "eddsa",
        fingerprint,
        identities: [],
      })),
      deliveryMethod: OPENPGP_DELIVERY_METHOD,
      properties: {},
    };
  }

  describe("Scenario: Parsing fragments", () => {
    it("Given a JSON array of entities, When parsing, Then each node should become a sensitive entity", () => {
      const entities = parseEnvelopeFragment(
        "#e1",
        encoder.encode('[{"@id":"#a","name":"A"},{"@id":"#b"}]'),
      );
      expect(entities).toEqual([
        { kind: "sensitive", id: "#a", properties: { name: "A" } },
        { kind: "sensitive", id: "#b", properties: {} },
      ]);
    });

    it("Given text that is not JSON, When parsing, Then it should fail with InvalidEnvelope", () => {
      expect(() => parseEnvelopeFragment("#e1", encoder.encode("not json"))).toThrow(
        InvalidEnvelopeError,
      );
    });

    it("Given a JSON object instead of a list, When parsing, Then it should fail with InvalidEnvelope", () => {
      let caught: unknown;
      try {
        parseEnvelopeFragment("#e1", encoder.encode('{"@id":"#a"}'));
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidEnvelopeError);
      expect(caught).toMatchObject({
        code: "INVALID_ENVELOPE",
        expectedFormat: "JSON array of entities",
        actualFormat: "object",
      });
    });

    it("Given a node without an id, When parsing, Then it should fail with InvalidEnvelope", () => {
      expect(() =>
        parseEnvelopeFragment("#e1", encoder.encode('[{"name":"anonymous"}]')),
      ).toThrow(InvalidEnvelopeError);
    });
  });

  describe("Scenario: Decoding a graph", () => {
    it("Given an envelope for a held key, When decoding, Then its entities should replace it in the graph", async () => {
      const { backend, logger, decoder } = setup();
      const envelope = await seal(
        backend,
        "#e1",
        ["AAAA"],
        '[{"@id":"#secret","name":"hidden"}]',
      );
      const graph = createMetadataGraph([createPlainEntity("#public"), envelope]);

      const decoded = await decoder.decode(graph);

      expect(decoded).toEqual([
        { kind: "sensitive", id: "#secret", properties: { name: "hidden" } },
      ]);
      expect(graph.getEntities().map((entity) => entity.id)).toEqual([
        "#public",
        "#secret",
      ]);
      expect(graph.getEnvelopes()).toEqual([]);
      expect(logger.info).toHaveBeenCalledWith(
        { envelopeId: "#e1", entities: ["#secret"] },
        "Decrypted envelope",
      );
    });

    it("Given an envelope only another reader can open, When decoding, Then it should stay in the graph", async () => {
      const { backend, logger, decoder } = setup();
      const mine = await seal(backend, "#mine", ["AAAA", "BBBB"], '[{"@id":"#shared"}]');
      const theirs = await seal(backend, "#theirs", ["BBBB"], '[{"@id":"#private"}]');
      const graph = createMetadataGraph([mine, theirs]);

      const decoded = await decoder.decode(graph);

      expect(decoded.map((entity) => entity.id)).toEqual(["#shared"]);
      expect(graph.getEnvelopes()).toEqual([theirs]);
      expect(graph.dereference("#private")).toBeNull();
      expect(logger.debug).toHaveBeenCalledWith(
        { envelopeId: "#theirs", status: "decryption failed: no secret key" },
        "No local key opens envelope, skipping",
      );
    });

    it("Given an envelope whose plaintext is malformed, When decoding, Then it should reject with InvalidEnvelope", async () => {
      const { backend, decoder } = setup();
      const envelope = await seal(backend, "#broken", ["AAAA"], '{"not":"a list"}');

      await expect(decoder.decode(createMetadataGraph([envelope]))).rejects.toBeInstanceOf(
        InvalidEnvelopeError,
      );
    });

    it("Given a valid envelope before a malformed one, When decoding, Then the graph should be left untouched", async () => {
      const { backend, logger, decoder } = setup();
      const good = await seal(backend, "#good", ["AAAA"], '[{"@id":"#secret"}]');
      const broken = await seal(backend, "#broken", ["AAAA"], "not json");
      const graph = createMetadataGraph([createPlainEntity("#public"), good, broken]);

      await expect(decoder.decode(graph)).rejects.toBeInstanceOf(InvalidEnvelopeError);

      expect(graph.getEntities().map((entity) => entity.id)).toEqual([
        "#public",
        "#good",
        "#broken",
      ]);
      expect(graph.dereference("#secret")).toBeNull();
      expect(logger.info).not.toHaveBeenCalled();
    });

    it("Given a graph without envelopes, When decoding, Then nothing should change", async () => {
      const { decoder } = setup();
      const graph = createMetadataGraph([createPlainEntity("#a")]);
      expect(await decoder.decode(graph)).toEqual([]);
      expect(graph.getEntities()).toHaveLength(1);
    });
  });
});
