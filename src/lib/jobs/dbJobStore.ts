/**
 * DB-backed JobStore. Used when PERSISTENCE_DRIVER=db.
 */

import { and, desc, eq, isNull, notInArray, or, type SQL } from "drizzle-orm";
import { z } from "zod";
import { getDb, type Db } from "../db/index.js";
import { generations } from "../db/schema.js";
import {
  JobStateError,
  TERMINAL_JOB_STATUSES,
  assertJobPatchAllowed,
  initialJob,
  toJobStatus,
  type GenerationJob,
  type JobParameters,
  type JobPatch,
  type JobQuery,
  type JobStore,
  type NewJob,
} from "./types.js";

type GenerationRow = typeof generations.$inferSelect;

const ParametersSchema = z.object({
  duration: z.number(),
  aspectRatio: z.string(),
  seed: z.number().nullable().optional(),
  fps: z.number().nullable().optional(),
});

function toParameters(raw: unknown, id: string): JobParameters {
  const parsed = ParametersSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Jobs] Malformed parameters on job ${id}; using defaults`);
    return { duration: 5, aspectRatio: "16:9" };
  }
  return parsed.data;
}

/** UPDATE that only matches non-terminal rows whose provider job id is unset or unchanged. */
export function guardedJobUpdate(db: Db, id: string, patch: JobPatch) {
  const set: Partial<typeof generations.$inferInsert> = { updatedAt: new Date() };
  if (patch.status !== undefined) set.status = patch.status;
  if (patch.providerJobId !== undefined) set.providerJobId = patch.providerJobId;
  if (patch.errorMessage !== undefined) set.errorMessage = patch.errorMessage;
  if (patch.videoUrl !== undefined) set.videoUrl = patch.videoUrl;
  if (patch.videoPath !== undefined) set.videoPath = patch.videoPath;
  if (patch.cost !== undefined) set.cost = patch.cost;
  if (patch.durationSeconds !== undefined) set.durationSeconds = patch.durationSeconds;
  if (patch.generationTimeSeconds !== undefined) set.generationTime = patch.generationTimeSeconds;
  if (patch.width !== undefined) set.width = patch.width;
  if (patch.height !== undefined) set.height = patch.height;
  if (patch.completedAt !== undefined) {
    set.completedAt = patch.completedAt ? new Date(patch.completedAt) : null;
  }

  const conditions: SQL[] = [
    eq(generations.id, id),
    notInArray(generations.status, [...TERMINAL_JOB_STATUSES]),
  ];
  if (patch.providerJobId != null) {
    const unsetOrSame = or(isNull(generations.providerJobId), eq(generations.providerJobId, patch.providerJobId));
    if (unsetOrSame) conditions.push(unsetOrSame);
  }
  return db.update(generations).set(set).where(and(...conditions));
}

function toJob(r: GenerationRow): GenerationJob {
  const status = toJobStatus(r.status);
  if (!status) {
    console.warn(`[Jobs] Unknown job status in db: ${r.status}; treating as failed`);
  }
  return {
    id: r.id,
    provider: r.provider,
    model: r.model,
    prompt: r.prompt,
    parameters: toParameters(r.parameters, r.id),
    status: status ?? "failed",
    providerJobId: r.providerJobId,
    errorMessage: r.errorMessage,
    videoUrl: r.videoUrl,
    videoPath: r.videoPath,
    cost: r.cost,
    durationSeconds: r.durationSeconds,
    generationTimeSeconds: r.generationTime,
    width: r.width,
    height: r.height,
    createdAt: r.createdAt.toISOString(),
    updatedAt: r.updatedAt.toISOString(),
    completedAt: r.completedAt ? r.completedAt.toISOString() : null,
  };
}

export class DbJobStore implements JobStore {
  async get(id: string): Promise<GenerationJob | undefined> {
    const db = getDb();
    const rows = await db.select().from(generations).where(eq(generations.id, id));
    return rows.length > 0 ? toJob(rows[0]) : undefined;
  }

  async create(input: NewJob): Promise<GenerationJob> {
    const db = getDb();
    const job = initialJob(input, new Date().toISOString());
    const rows = await db
      .insert(generations)
      .values({
        id: job.id,
        provider: job.provider,
        model: job.model,
        prompt: job.prompt,
        parameters: job.parameters,
        status: job.status,
        createdAt: new Date(job.createdAt),
        updatedAt: new Date(job.updatedAt),
      })
      .returning();
    return toJob(rows[0]);
  }

  /**
   * The lifecycle guard lives in the WHERE clause, so a row that turned
   * terminal after the caller read it is never overwritten.
   */
  async update(id: string, patch: JobPatch): Promise<GenerationJob | undefined> {
    const rows = await guardedJobUpdate(getDb(), id, patch).returning();
    if (rows.length > 0) return toJob(rows[0]);

    const current = await this.get(id);
    if (!current) return undefined;
    assertJobPatchAllowed(current, patch);
    throw new JobStateError(`Job ${id} changed concurrently and was not updated`);
  }

  async list(query: JobQuery = {}): Promise<GenerationJob[]> {
    const db = getDb();
    const conditions: SQL[] = [];
    if (query.provider != null) conditions.push(eq(generations.provider, query.provider));
    if (query.status != null) conditions.push(eq(generations.status, query.status));
    let q = db
      .select()
      .from(generations)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(generations.createdAt))
      .$dynamic();
    if (query.limit != null) q = q.limit(query.limit);
    if (query.skip != null && query.skip > 0) q = q.offset(query.skip);
    const rows = await q;
    return rows.map(toJob);
  }

  async delete(id: string): Promise<boolean> {
    const db = getDb();
    const rows = await db
      .delete(generations)
      .where(eq(generations.id, id))
      .returning({ id: generations.id });
    return rows.length > 0;
  }
}
