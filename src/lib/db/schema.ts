/**
 * Drizzle schema for generation jobs and provider credentials.
 */

import { pgTable, text, timestamp, jsonb, serial, real, integer, index } from "drizzle-orm/pg-core";

/** Video generation jobs. */
export const generations = pgTable(
  "generations",
  {
    id: text("id").primaryKey(),
    provider: text("provider").notNull(),
    model: text("model").notNull(),
    prompt: text("prompt").notNull(),
    parameters: jsonb("parameters").notNull(),
    status: text("status").notNull(),
    providerJobId: text("provider_job_id"),
    errorMessage: text("error_message"),
    videoUrl: text("video_url"),
    videoPath: text("video_path"),
    cost: real("cost"),
    durationSeconds: real("duration_seconds"),
    generationTime: real("generation_time"),
    width: integer("width"),
    height: integer("height"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (t) => ({
    providerIdx: index("generations_provider_idx").on(t.provider),
    createdAtIdx: index("generations_created_at_idx").on(t.createdAt),
  })
);

/** Provider API keys. Ciphertext only. */
export const apiKeys = pgTable(
  "api_keys",
  {
    id: serial("id").primaryKey(),
    provider: text("provider").notNull(),
    encryptedKey: text("encrypted_key").notNull(),
    status: text("status").notNull(),
    lastValidatedAt: timestamp("last_validated_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    providerIdx: index("api_keys_provider_idx").on(t.provider),
  })
);
