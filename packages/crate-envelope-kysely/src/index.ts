/**
 * @crate-envelope/kysely
 *
 * Kysely keyring storage for the OpenPGP backend.
 */

// Export schema types
export type { KeyringDatabase, KeyringTable } from "./schema/keyring-schema.js";

// Export migration
export { down, up } from "./migrations/keyring.migration.js";

// Export keyring adapters
export {
  createKeyringStorage,
  createOpenPgpBackend,
} from "./adapters/keyring.kysely-adapter.js";
