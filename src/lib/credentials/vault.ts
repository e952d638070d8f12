/**
 * CredentialVault: provider secrets encrypted at rest, with lifecycle status.
 * Plaintext leaves the vault only through decrypt/decryptKey and is never logged.
 */

import { errorMessage } from "../errors.js";
import type { ProviderAdapter } from "../providers/types.js";
import { EncryptionService } from "./encryption.js";
import type {
  Credential,
  CredentialStatus,
  CredentialStore,
  PublicCredential,
} from "./types.js";

const PREVIEW_PREFIX = 8;
const PREVIEW_SUFFIX = 4;

/** First 8 and last 4 characters; short secrets show only the suffix. */
export function maskSecret(secret: string): string {
  if (secret.length > PREVIEW_PREFIX + PREVIEW_SUFFIX + 4) {
    return `${secret.slice(0, PREVIEW_PREFIX)}...${secret.slice(-PREVIEW_SUFFIX)}`;
  }
  if (secret.length > PREVIEW_SUFFIX * 2) {
    return `...${secret.slice(-PREVIEW_SUFFIX)}`;
  }
  return "****";
}

export interface KeyValidationResult {
  valid: boolean;
  status: CredentialStatus;
  error?: string;
}

export type AdapterFactory = (provider: string, secret: string) => ProviderAdapter;

export class CredentialVault {
  constructor(
    private readonly store: CredentialStore,
    private readonly encryption: EncryptionService,
    private readonly now: () => Date = () => new Date()
  ) {}

  encrypt(plaintext: string): string {
    return this.encryption.encrypt(plaintext);
  }

  decrypt(ciphertext: string): string {
    return this.encryption.decrypt(ciphertext);
  }

  decryptKey(credential: Credential): string {
    return this.encryption.decrypt(credential.encryptedKey);
  }

  /** Stores the secret encrypted, as ACTIVE. Callers validate against the provider first. */
  addKey(provider: string, plaintext: string, validatedAt?: Date): Promise<Credential> {
    return this.store.create({
      provider,
      encryptedKey: this.encrypt(plaintext),
      status: "active",
      lastValidatedAt: validatedAt ? validatedAt.toISOString() : null,
    });
  }

  getKey(id: number): Promise<Credential | undefined> {
    return this.store.get(id);
  }

  /** First ACTIVE credential for the provider, by ascending id. */
  async getActiveKeyForProvider(provider: string): Promise<Credential | undefined> {
    const rows = await this.store.list({ provider, status: "active" });
    return rows[0];
  }

  /** All credentials except REVOKED ones, by ascending id. */
  listKeys(): Promise<Credential[]> {
    return this.store.list({ excludeStatus: "revoked" });
  }

  /** Sets status and refreshes lastValidatedAt. */
  updateStatus(id: number, status: CredentialStatus): Promise<Credential | undefined> {
    return this.store.update(id, { status, lastValidatedAt: this.now().toISOString() });
  }

  async revokeKey(id: number): Promise<boolean> {
    const updated = await this.store.update(id, { status: "revoked" });
    return updated !== undefined;
  }

  deleteKey(id: number): Promise<boolean> {
    return this.store.delete(id);
  }

  /**
   * Re-checks a stored key against its provider: ACTIVE when the provider
   * accepts it, INVALID otherwise (including when the key cannot be decrypted).
   * Returns undefined for unknown ids.
   */
  async validateKey(id: number, createAdapter: AdapterFactory): Promise<KeyValidationResult | undefined> {
    const credential = await this.store.get(id);
    if (!credential) return undefined;
    try {
      const adapter = createAdapter(credential.provider, this.decryptKey(credential));
      const valid = await adapter.validateKey();
      const status: CredentialStatus = valid ? "active" : "invalid";
      await this.updateStatus(id, status);
      return { valid, status };
    } catch (e) {
      const error = errorMessage(e);
      console.warn(`[Vault] Validation of key ${id} (${credential.provider}) failed: ${error}`);
      await this.updateStatus(id, "invalid");
      return { valid: false, status: "invalid", error };
    }
  }

  toPublicCredential(credential: Credential): PublicCredential {
    let keyPreview: string;
    try {
      keyPreview = maskSecret(this.decryptKey(credential));
    } catch {
      keyPreview = "(undecryptable)";
    }
    return {
      id: credential.id,
      provider: credential.provider,
      status: credential.status,
      lastValidated: credential.lastValidatedAt,
      createdAt: credential.createdAt,
      keyPreview,
    };
  }
}
