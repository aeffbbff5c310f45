import { normalizeFingerprint } from "@crate-envelope/core";

export const HKP_GET_PATH = "/pks/lookup?op=get&options=mr&search=0x";

/** Machine-readable HKP download URL for one key. */
export function keyserverGetUrl(keyserver: string, fingerprint: string): string {
  return `${keyserver}${HKP_GET_PATH}${normalizeFingerprint(fingerprint)}`;
}
