import { describe, expect, it, vi } from "vitest";
import { MissingMemberError, NoValidKeysError } from "../errors.js";
import {
  appendReference,
  createPlainEntity,
  createSensitiveEntity,
} from "../graph/entities.js";
import { createMetadataGraph } from "../graph/metadata-graph.js";
import { createRecipientResolver } from "./recipient.resolver.js";

const KEY_1 = "ABCD00000000000000000000000000000000001234";
const KEY_2 = "BCDE00000000000000000000000000000000002345";
const KEY_3 = "CDEF00000000000000000000000000000000003456";

describe("Feature: Recipient Resolver", () => {
  describe("Scenario: Resolving through keyholders", () => {
    it("Given an entity whose recipient carries a fingerprint, When resolving, Then it should return that fingerprint", () => {
      const keyholder = createPlainEntity("#keyholder-1", {
        pubkey_fingerprints: KEY_1,
      });
      const meta = createSensitiveEntity("#meta", {
        recipients: [{ "@id": "#keyholder-1" }],
      });
      const graph = createMetadataGraph([keyholder, meta]);
      const resolver = createRecipientResolver({ graph });

      expect(resolver.resolve(meta)).toEqual([KEY_1]);
    });

    it("Given explicit and inherited keys with overlap, When resolving, Then it should return their sorted union", () => {
      const first = createPlainEntity("#first", { pubkey_fingerprints: [KEY_3, KEY_1] });
      const second = createPlainEntity("#second", { pubkey_fingerprints: KEY_1 });
      const meta = createSensitiveEntity("#meta", {}, KEY_2);
      appendReference(meta, "recipients", first);
      appendReference(meta, "recipients", second);
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([first, second, meta]),
      });

      expect(resolver.resolve(meta)).toEqual([KEY_1, KEY_2, KEY_3]);
    });

    it("Given a recipient that itself has recipients, When resolving, Then only one level should be followed", () => {
      const inner = createPlainEntity("#inner", { pubkey_fingerprints: KEY_3 });
      const outer = createPlainEntity("#outer", {
        pubkey_fingerprints: KEY_1,
        recipients: [{ "@id": "#inner" }],
      });
      const meta = createSensitiveEntity("#meta", { recipients: "#outer" });
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([inner, outer, meta]),
      });

      expect(resolver.resolve(meta)).toEqual([KEY_1]);
    });

    it("Given the same key written in different cases, When resolving, Then it should be counted once in upper case", () => {
      const keyholder = createPlainEntity("#k", { pubkey_fingerprints: KEY_1 });
      const meta = createSensitiveEntity(
        "#meta",
        { recipients: { "@id": "#k" } },
        KEY_1.toLowerCase(),
      );
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([keyholder, meta]),
        defaultFingerprints: [KEY_2.toLowerCase()],
      });

      expect(resolver.resolve(meta)).toEqual([KEY_1, KEY_2]);
    });

    it("Given an unchanged entity, When resolving twice, Then both results should be equal", () => {
      const keyholder = createPlainEntity("#k", { pubkey_fingerprints: [KEY_2, KEY_1] });
      const meta = createSensitiveEntity("#meta", { recipients: { "@id": "#k" } });
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([keyholder, meta]),
      });

      const first = resolver.resolve(meta);
      const second = resolver.resolve(meta);
      expect(second).toEqual(first);
      expect(meta.properties).toEqual({ recipients: { "@id": "#k" } });
    });
  });

  describe("Scenario: Missing recipients", () => {
    it("Given an entity with no recipients and no keys, When resolving, Then it should fail with NoValidKeys", () => {
      const meta = createSensitiveEntity("#meta");
      const resolver = createRecipientResolver({ graph: createMetadataGraph([meta]) });

      let caught: unknown;
      try {
        resolver.resolve(meta);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NoValidKeysError);
      expect(caught).toMatchObject({ entityId: "#meta", missingMembers: [] });
    });

    it("Given an unknown recipient id and tolerance off, When resolving, Then it should fail with MissingMember", () => {
      const meta = createSensitiveEntity("#meta", { recipients: [{ "@id": "#ghost" }] });
      const resolver = createRecipientResolver({ graph: createMetadataGraph([meta]) });

      expect(() => resolver.resolve(meta)).toThrowError(
        new MissingMemberError("#meta", ["#ghost"]).message,
      );
    });

    it("Given one keyless and one valid recipient with tolerance off, When resolving, Then a single missing member should be fatal", () => {
      const keyless = createPlainEntity("#keyless");
      const valid = createPlainEntity("#valid", { pubkey_fingerprints: KEY_1 });
      const meta = createSensitiveEntity("#meta", {
        recipients: [{ "@id": "#keyless" }, { "@id": "#valid" }],
      });
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([keyless, valid, meta]),
      });

      expect(() => resolver.resolve(meta)).toThrow(MissingMemberError);
    });

    it("Given one keyless and one valid recipient with tolerance on, When resolving, Then the surviving keys should be returned and the gap logged", () => {
      const keyless = createPlainEntity("#keyless");
      const valid = createPlainEntity("#valid", { pubkey_fingerprints: KEY_1 });
      const meta = createSensitiveEntity("#meta", {
        recipients: [{ "@id": "#ghost" }, { "@id": "#keyless" }, { "@id": "#valid" }],
      });
      const logger = { info: vi.fn(), error: vi.fn(), warn: vi.fn() };
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([keyless, valid, meta]),
        logger,
      });

      expect(resolver.resolve(meta, { allowMissing: true })).toEqual([KEY_1]);
      expect(logger.warn).toHaveBeenCalledWith(
        { entityId: "#meta", missingMembers: ["#ghost", "#keyless"] },
        "Recipients without usable keys skipped",
      );
    });

    it("Given only keyless recipients with tolerance on, When resolving, Then it should fail with NoValidKeys listing them", () => {
      const keyless = createPlainEntity("#keyless");
      const meta = createSensitiveEntity("#meta", { recipients: "#keyless" });
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([keyless, meta]),
      });

      let caught: unknown;
      try {
        resolver.resolve(meta, { allowMissing: true });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NoValidKeysError);
      expect(caught).toMatchObject({ entityId: "#meta", missingMembers: ["#keyless"] });
    });
  });

  describe("Scenario: Crate-wide default keys", () => {
    it("Given default fingerprints, When resolving an entity with its own keys, Then defaults should be unioned in", () => {
      const meta = createSensitiveEntity("#meta", {}, KEY_2);
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([meta]),
        defaultFingerprints: [KEY_1, KEY_2],
      });

      expect(resolver.resolve(meta)).toEqual([KEY_1, KEY_2]);
    });

    it("Given default fingerprints, When resolving an entity with no keys of its own, Then the defaults should suffice", () => {
      const meta = createSensitiveEntity("#meta");
      const resolver = createRecipientResolver({
        graph: createMetadataGraph([meta]),
        defaultFingerprints: [KEY_3],
      });

      expect(resolver.resolve(meta)).toEqual([KEY_3]);
    });
  });
});
