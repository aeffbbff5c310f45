import { describe, expect, it } from "vitest";
import { loadCrateEncryptionConfig } from "./config.js";
import { InvalidParameterError } from "./errors.js";
import { createLogger } from "./logger.js";

describe("Feature: Configuration", () => {
  describe("Scenario: Loading from the environment", () => {
    it("Given an empty environment, When loading, Then defaults should apply", () => {
      expect(loadCrateEncryptionConfig({})).toEqual({
        defaultFingerprints: [],
        allowMissing: false,
        keyserver: undefined,
        logLevel: "info",
      });
    });

    it("Given every variable, When loading, Then values should be parsed", () => {
      expect(
        loadCrateEncryptionConfig({
          CRATE_DEFAULT_FINGERPRINTS: " AAAA, ,BBBB ",
          CRATE_ALLOW_MISSING: "true",
          CRATE_KEYSERVER: "https://keys.example.org",
          CRATE_LOG_LEVEL: "debug",
        }),
      ).toEqual({
        defaultFingerprints: ["AAAA", "BBBB"],
        allowMissing: true,
        keyserver: "https://keys.example.org",
        logLevel: "debug",
      });
    });

    it("Given blank variables, When loading, Then they should count as unset", () => {
      expect(
        loadCrateEncryptionConfig({ CRATE_KEYSERVER: "", CRATE_LOG_LEVEL: "" }),
      ).toMatchObject({ keyserver: undefined, logLevel: "info" });
    });

    it("Given a keyserver that is not a URL, When loading, Then it should fail with InvalidParameter", () => {
      let caught: unknown;
      try {
        loadCrateEncryptionConfig({ CRATE_KEYSERVER: "not a url" });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidParameterError);
      expect(caught).toMatchObject({ parameter: "CRATE_KEYSERVER", value: "not a url" });
    });
  });

  describe("Scenario: Logger", () => {
    it("Given a level, When creating a logger, Then it should use that level", () => {
      const logger = createLogger({ name: "test", level: "silent" });
      expect(logger.level).toBe("silent");
      expect(createLogger().level).toBe("info");
    });
  });
});
