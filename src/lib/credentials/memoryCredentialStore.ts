/**
 * In-memory CredentialStore. Default driver and test double.
 */

import type {
  Credential,
  CredentialFilter,
  CredentialPatch,
  CredentialStore,
  NewCredential,
} from "./types.js";

export function matchesCredentialFilter(c: Credential, filter: CredentialFilter = {}): boolean {
  if (filter.provider != null && c.provider !== filter.provider) return false;
  if (filter.status != null && c.status !== filter.status) return false;
  if (filter.excludeStatus != null && c.status === filter.excludeStatus) return false;
  return true;
}

export class InMemoryCredentialStore implements CredentialStore {
  private readonly rows = new Map<number, Credential>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(id: number): Promise<Credential | undefined> {
    const row = this.rows.get(id);
    return row ? { ...row } : undefined;
  }

  async create(input: NewCredential): Promise<Credential> {
    const ts = this.now().toISOString();
    const row: Credential = {
      id: this.nextId++,
      provider: input.provider,
      encryptedKey: input.encryptedKey,
      status: input.status,
      lastValidatedAt: input.lastValidatedAt ?? null,
      createdAt: ts,
      updatedAt: ts,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(id: number, patch: CredentialPatch): Promise<Credential | undefined> {
    const row = this.rows.get(id);
    if (!row) return undefined;
    if (patch.status != null) row.status = patch.status;
    if (patch.lastValidatedAt !== undefined) row.lastValidatedAt = patch.lastValidatedAt;
    row.updatedAt = this.now().toISOString();
    return { ...row };
  }

  async delete(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }

  async list(filter?: CredentialFilter): Promise<Credential[]> {
    return [...this.rows.values()]
      .filter((c) => matchesCredentialFilter(c, filter))
      .sort((a, b) => a.id - b.id)
      .map((c) => ({ ...c }));
  }
}
