/**
 * Credentials: encryption at rest, storage drivers and the vault.
 */

import { getPersistenceDriver } from "../config.js";
import { DbCredentialStore } from "./dbCredentialStore.js";
import { InMemoryCredentialStore } from "./memoryCredentialStore.js";
import type { CredentialStore } from "./types.js";

export type {
  Credential,
  CredentialFilter,
  CredentialPatch,
  CredentialStatus,
  CredentialStore,
  NewCredential,
  PublicCredential,
} from "./types.js";
export { CREDENTIAL_STATUSES } from "./types.js";
export { EncryptionService, InvalidTokenError } from "./encryption.js";
export { CredentialVault, maskSecret } from "./vault.js";
export type { AdapterFactory, KeyValidationResult } from "./vault.js";
export { InMemoryCredentialStore } from "./memoryCredentialStore.js";
export { DbCredentialStore } from "./dbCredentialStore.js";

export function createCredentialStore(): CredentialStore {
  return getPersistenceDriver() === "db" ? new DbCredentialStore() : new InMemoryCredentialStore();
}
