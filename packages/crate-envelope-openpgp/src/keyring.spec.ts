import { describe, expect, it } from "vitest";
import { createInMemoryKeyring } from "./keyring.js";
import { keyserverGetUrl } from "./keyserver.js";

describe("Feature: In-Memory Keyring", () => {
  describe("Scenario: Storing keys", () => {
    it("Given a saved key, When saving again with the same fingerprint, Then it should be replaced", async () => {
      const keyring = createInMemoryKeyring();
      await keyring.saveKey({ fingerprint: "AAAA", armoredKey: "old", isPrivate: false });
      await keyring.saveKey({ fingerprint: "AAAA", armoredKey: "new", isPrivate: true });

      expect(await keyring.listKeys()).toEqual([
        { fingerprint: "AAAA", armoredKey: "new", isPrivate: true },
      ]);
    });

    it("Given a stored key, When mutating a lookup result, Then the keyring should not change", async () => {
      const keyring = createInMemoryKeyring([
        { fingerprint: "AAAA", armoredKey: "armored", isPrivate: false },
      ]);
      const found = await keyring.findKey("AAAA");
      if (found) found.isPrivate = true;

      expect((await keyring.findKey("AAAA"))?.isPrivate).toBe(false);
      expect(await keyring.findKey("BBBB")).toBeNull();
    });

    it("Given a stored key, When deleting twice, Then only the first delete should report success", async () => {
      const keyring = createInMemoryKeyring([
        { fingerprint: "AAAA", armoredKey: "armored", isPrivate: false },
      ]);
      expect(await keyring.deleteKey("AAAA")).toBe(true);
      expect(await keyring.deleteKey("AAAA")).toBe(false);
    });
  });

  describe("Scenario: Keyserver URLs", () => {
    it("Given a spaced lower-case fingerprint, When building the download URL, Then it should be normalised", () => {
      expect(keyserverGetUrl("https://keys.example.org", "ab12 cd34")).toBe(
        "https://keys.example.org/pks/lookup?op=get&options=mr&search=0xAB12CD34",
      );
    });
  });
});
