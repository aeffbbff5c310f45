import { z } from "zod";
import type { JsonObject, JsonValue } from "../types.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const entityObjectSchema = jsonObjectSchema.refine(
  (node) => typeof node["@id"] === "string" && node["@id"] !== "",
  { message: 'Every entity needs a non-empty string "@id"' },
);

/** Plaintext of a decrypted envelope: the JSON-LD objects of its entities. */
export const envelopeFragmentSchema = z.array(entityObjectSchema);

const referenceSchema = z.object({ "@id": z.string().min(1) });

export const persistedEnvelopeSchema = z
  .object({
    "@id": z.string().min(1),
    "@type": z.union([z.string(), z.array(z.string())]),
    deliveryMethod: z.string().optional(),
    recipients: z.union([referenceSchema, z.array(referenceSchema)]),
    encryptedGraph: z.string().min(1),
  })
  .passthrough();

export const crateDocumentSchema = z.object({
  "@context": jsonValueSchema,
  "@graph": z.array(entityObjectSchema),
  "@encrypted": z.array(z.unknown()).optional(),
});

export type PersistedEnvelope = z.infer<typeof persistedEnvelopeSchema>;
