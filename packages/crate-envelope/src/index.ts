// Re-export all types from the types module
export * from "./types.js";

// Export crate facade
export {
  createCrateEncryption,
  createCrateEncryptionFromConfig,
  type CrateEncryption,
  type CrateEncryptionOptions,
  type OpenedCrate,
} from "./crate/crate-encryption.js";
export {
  METADATA_BASENAME,
  readCrateMetadata,
  writeCrateMetadata,
} from "./crate/crate-files.js";

// Export graph model and document codec
export {
  AUDIENCE_TYPE,
  DEFAULT_ACTION_TYPE,
  ENVELOPE_TYPE,
  FINGERPRINTS_PROPERTY,
  OPENPGP_DELIVERY_METHOD,
  RECIPIENTS_PROPERTY,
  addSensitiveKeys,
  appendReference,
  appendTo,
  createPlainEntity,
  createSensitiveEntity,
  getProperty,
  getTypes,
  setProperty,
  toJsonLd,
  toReference,
  toReferences,
  toStringList,
  type EnvelopeRecord,
  type GraphEntity,
  type PlainEntity,
  type RecipientDescriptor,
  type SensitiveEntity,
} from "./graph/entities.js";
export {
  createMetadataGraph,
  type MetadataGraph,
} from "./graph/metadata-graph.js";
export {
  AUDIENCE_DESCRIPTION,
  DEFAULT_CRATE_CONTEXT,
  ENCRYPTED_FIELD,
  parseCrateDocument,
  serializeCrateDocument,
  serializeDescriptor,
  serializeEnvelope,
  type CrateDocument,
} from "./graph/crate-document.js";

// Export key identity helpers
export {
  NO_VALID_CONTACT,
  hasValidContact,
  keyIdentityFromLocalKey,
  normalizeFingerprint,
  parseIdentity,
  primaryIdentity,
  type ParsedIdentity,
} from "./identity/key-identity.js";

// Export envelope pipeline
export {
  createRecipientResolver,
  type RecipientResolver,
  type ResolveOptions,
} from "./recipients/recipient.resolver.js";
export {
  createEnvelopeAggregator,
  type EnvelopeAggregator,
  type RecipientGroup,
} from "./envelope/envelope.aggregator.js";
export {
  buildRecipientDescriptors,
  createEnvelopeEncoder,
  generateEnvelopeId,
  serializeGroup,
  type EncodeResult,
  type EnvelopeEncoder,
} from "./envelope/envelope.encoder.js";
export {
  createEnvelopeDecoder,
  parseEnvelopeFragment,
  type EnvelopeDecoder,
} from "./envelope/envelope.decoder.js";

// Export keyholders
export {
  HKP_INDEX_PATH,
  KEYHOLDER_TYPES,
  createKeyholder,
  isKeyholder,
  keyserverIndexUrl,
  retrieveKeyholderKeys,
} from "./keyholders/keyholder.js";

// Export in-memory backend
export {
  createInMemoryBackend,
  type InMemoryBackend,
  type InMemoryKey,
} from "./backends/inmemory-backend.js";

// Export configuration and logging
export {
  loadCrateEncryptionConfig,
  type CrateEncryptionConfig,
} from "./config.js";
export { createLogger } from "./logger.js";

// Export error types
export {
  BackendFailureError,
  CrateEnvelopeError,
  InvalidEnvelopeError,
  InvalidParameterError,
  KeyserverWarning,
  MissingMemberError,
  NoValidKeysError,
} from "./errors.js";
