/**
 * DB-backed CredentialStore. Used when PERSISTENCE_DRIVER=db.
 */

import { and, asc, eq, ne, type SQL } from "drizzle-orm";
import { getDb } from "../db/index.js";
import { apiKeys } from "../db/schema.js";
import { CREDENTIAL_STATUSES } from "./types.js";
import type {
  Credential,
  CredentialFilter,
  CredentialPatch,
  CredentialStatus,
  CredentialStore,
  NewCredential,
} from "./types.js";

type ApiKeyRow = typeof apiKeys.$inferSelect;

function toStatus(raw: string): CredentialStatus {
  const found = CREDENTIAL_STATUSES.find((s) => s === raw);
  if (!found) {
    console.warn(`[Vault] Unknown credential status in db: ${raw}; treating as invalid`);
    return "invalid";
  }
  return found;
}

function toCredential(r: ApiKeyRow): Credential {
  return {
    id: r.id,
    provider: r.provider,
    encryptedKey: r.encryptedKey,
    status: toStatus(r.status),
    lastValidatedAt: r.lastValidatedAt ? r.lastValidatedAt.toISOString() : null,
    createdAt: r.createdAt.toISOString(),
    updatedAt: r.updatedAt.toISOString(),
  };
}

export class DbCredentialStore implements CredentialStore {
  async get(id: number): Promise<Credential | undefined> {
    const db = getDb();
    const rows = await db.select().from(apiKeys).where(eq(apiKeys.id, id));
    return rows.length > 0 ? toCredential(rows[0]) : undefined;
  }

  async create(input: NewCredential): Promise<Credential> {
    const db = getDb();
    const now = new Date();
    const rows = await db
      .insert(apiKeys)
      .values({
        provider: input.provider,
        encryptedKey: input.encryptedKey,
        status: input.status,
        lastValidatedAt: input.lastValidatedAt ? new Date(input.lastValidatedAt) : null,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return toCredential(rows[0]);
  }

  async update(id: number, patch: CredentialPatch): Promise<Credential | undefined> {
    const db = getDb();
    const set: Partial<typeof apiKeys.$inferInsert> = { updatedAt: new Date() };
    if (patch.status != null) set.status = patch.status;
    if (patch.lastValidatedAt !== undefined) {
      set.lastValidatedAt = patch.lastValidatedAt ? new Date(patch.lastValidatedAt) : null;
    }
    const rows = await db.update(apiKeys).set(set).where(eq(apiKeys.id, id)).returning();
    return rows.length > 0 ? toCredential(rows[0]) : undefined;
  }

  async delete(id: number): Promise<boolean> {
    const db = getDb();
    const rows = await db.delete(apiKeys).where(eq(apiKeys.id, id)).returning({ id: apiKeys.id });
    return rows.length > 0;
  }

  async list(filter: CredentialFilter = {}): Promise<Credential[]> {
    const db = getDb();
    const conditions: SQL[] = [];
    if (filter.provider != null) conditions.push(eq(apiKeys.provider, filter.provider));
    if (filter.status != null) conditions.push(eq(apiKeys.status, filter.status));
    if (filter.excludeStatus != null) conditions.push(ne(apiKeys.status, filter.excludeStatus));
    const rows = await db
      .select()
      .from(apiKeys)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(apiKeys.id));
    return rows.map(toCredential);
  }
}
