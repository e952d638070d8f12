/**
 * Credential records and storage interface. Only ciphertext is stored.
 */

export type CredentialStatus = "active" | "invalid" | "quota_exceeded" | "revoked";

export const CREDENTIAL_STATUSES: readonly CredentialStatus[] = ["active", "invalid", "quota_exceeded", "revoked"];

export interface Credential {
  /** Assigned by the store in insertion order. */
  id: number;
  provider: string;
  encryptedKey: string;
  status: CredentialStatus;
  lastValidatedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewCredential {
  provider: string;
  encryptedKey: string;
  status: CredentialStatus;
  lastValidatedAt?: string | null;
}

export type CredentialPatch = Partial<Pick<Credential, "status" | "lastValidatedAt">>;

export interface CredentialFilter {
  provider?: string;
  status?: CredentialStatus;
  excludeStatus?: CredentialStatus;
}

/** Display form. Never carries the secret or its ciphertext. */
export interface PublicCredential {
  id: number;
  provider: string;
  status: CredentialStatus;
  lastValidated: string | null;
  createdAt: string;
  keyPreview: string;
}

/** Lists are ordered by ascending id in every implementation. */
export interface CredentialStore {
  get(id: number): Promise<Credential | undefined>;
  create(input: NewCredential): Promise<Credential>;
  update(id: number, patch: CredentialPatch): Promise<Credential | undefined>;
  delete(id: number): Promise<boolean>;
  list(filter?: CredentialFilter): Promise<Credential[]>;
}
