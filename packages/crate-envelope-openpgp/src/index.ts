// Export OpenPGP backend
export {
  createOpenPgpBackend,
  type FetchLike,
  type OpenPgpBackend,
  type OpenPgpBackendOptions,
} from "./openpgp.backend.js";

// Export keyring storage
export {
  createInMemoryKeyring,
  type KeyringStorage,
  type StoredKey,
} from "./keyring.js";

// Export keyserver helpers
export { HKP_GET_PATH, keyserverGetUrl } from "./keyserver.js";
