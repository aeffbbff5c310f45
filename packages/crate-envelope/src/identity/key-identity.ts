import type { KeyIdentity, LocalKeyInfo } from "../types.js";

export const NO_VALID_CONTACT = "No Valid Email";

const EMAIL_RE = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;

export type ParsedIdentity = { name: string; email: string };

function stripAngleBrackets(value: string): string {
  return value.replace(/^[<> ]+|[<> ]+$/g, "");
}

/**
 * Splits a raw key user id ("Joe Tester <joe@foo.bar>") into a display name
 * and a contact address. Never throws: an identity without a usable address
 * comes back whole with `NO_VALID_CONTACT` as its email.
 */
export function parseIdentity(raw: string): ParsedIdentity {
  const sections = raw.split(" ");
  let name: string;
  let email: string;
  if (sections.length > 1) {
    email = stripAngleBrackets(sections[sections.length - 1] ?? "");
    name = sections.slice(0, -1).join(" ").trim();
  } else {
    // name and address may be the same token
    name = stripAngleBrackets(raw);
    email = name;
  }
  if (!EMAIL_RE.test(email)) {
    return { name: raw, email: NO_VALID_CONTACT };
  }
  return { name, email };
}

/**
 * Canonical form of a key fingerprint: no whitespace, upper-case hex.
 * Every fingerprint is compared in this form.
 */
export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/\s+/g, "").toUpperCase();
}

export function hasValidContact(identity: ParsedIdentity): boolean {
  return identity.email !== NO_VALID_CONTACT;
}

/**
 * The identity a recipient is known by in the crate: its first user id,
 * or the fingerprint for keys that carry none.
 */
export function primaryIdentity(key: KeyIdentity): string {
  const first = key.identities.find((uid) => uid.trim() !== "");
  return first ?? key.fingerprint;
}

export function keyIdentityFromLocalKey(
  fingerprint: string,
  info: LocalKeyInfo | undefined,
): KeyIdentity {
  if (!info) {
    return { algorithm: "unknown", fingerprint, identities: [] };
  }
  return {
    algorithm: info.algorithm,
    fingerprint,
    identities: [...info.identities],
  };
}
