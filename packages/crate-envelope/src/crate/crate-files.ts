import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { CrateDocument } from "../graph/crate-document.js";

export const METADATA_BASENAME = "ro-crate-metadata.json";

export async function writeCrateMetadata(
  directory: string,
  document: CrateDocument,
): Promise<string> {
  const target = path.join(directory, METADATA_BASENAME);
  await writeFile(target, `${JSON.stringify(document, null, 4)}\n`, "utf8");
  return target;
}

/**
 * Reads the metadata file of a crate directory. The result is left untyped
 * for `parseCrateDocument` to validate.
 */
export async function readCrateMetadata(directory: string): Promise<unknown> {
  const raw = await readFile(path.join(directory, METADATA_BASENAME), "utf8");
  return JSON.parse(raw);
}
