/**
 * Generation job records, store interface, and the lifecycle invariants every
 * store enforces on update.
 */

import { randomUUID } from "crypto";

export type JobStatus = "queued" | "processing" | "completed" | "failed" | "cancelled";

export const JOB_STATUSES: readonly JobStatus[] = ["queued", "processing", "completed", "failed", "cancelled"];
export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ["completed", "failed", "cancelled"];

export interface JobParameters {
  /** Requested seconds. */
  duration: number;
  aspectRatio: string;
  seed?: number | null;
  fps?: number | null;
}

export interface GenerationJob {
  id: string;
  provider: string;
  model: string;
  prompt: string;
  parameters: JobParameters;
  status: JobStatus;
  /** Set once, right after a successful submission. */
  providerJobId: string | null;
  errorMessage: string | null;
  /** Public URL of the stored artifact. */
  videoUrl: string | null;
  /** Storage-relative path, e.g. /videos/gen_abc.mp4 */
  videoPath: string | null;
  cost: number | null;
  durationSeconds: number | null;
  generationTimeSeconds: number | null;
  width: number | null;
  height: number | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface NewJob {
  id: string;
  provider: string;
  model: string;
  prompt: string;
  parameters: JobParameters;
}

export type JobPatch = Partial<
  Pick<
    GenerationJob,
    | "status"
    | "providerJobId"
    | "errorMessage"
    | "videoUrl"
    | "videoPath"
    | "cost"
    | "durationSeconds"
    | "generationTimeSeconds"
    | "width"
    | "height"
    | "completedAt"
  >
>;

export interface JobQuery {
  provider?: string;
  status?: JobStatus;
  skip?: number;
  limit?: number;
}

/** Lists are newest first. update() returns undefined when the job does not exist. */
export interface JobStore {
  get(id: string): Promise<GenerationJob | undefined>;
  create(job: NewJob): Promise<GenerationJob>;
  update(id: string, patch: JobPatch): Promise<GenerationJob | undefined>;
  list(query?: JobQuery): Promise<GenerationJob[]>;
  delete(id: string): Promise<boolean>;
}

/** Rejected write against a job's lifecycle invariants. */
export class JobStateError extends Error {
  override readonly name = "JobStateError";
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function toJobStatus(raw: string): JobStatus | undefined {
  return JOB_STATUSES.find((s) => s === raw);
}

/**
 * Throws JobStateError when the patch would move a terminal job or overwrite
 * its provider job id.
 */
export function assertJobPatchAllowed(current: GenerationJob, patch: JobPatch): void {
  if (isTerminalStatus(current.status)) {
    throw new JobStateError(`Job ${current.id} is ${current.status} and cannot be updated`);
  }
  if (
    patch.providerJobId !== undefined &&
    current.providerJobId !== null &&
    patch.providerJobId !== current.providerJobId
  ) {
    throw new JobStateError(`Job ${current.id} already has provider job id ${current.providerJobId}`);
  }
}

/** gen_ + 12 hex chars */
export function newJobId(): string {
  return `gen_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function initialJob(job: NewJob, nowISO: string): GenerationJob {
  return {
    ...job,
    status: "queued",
    providerJobId: null,
    errorMessage: null,
    videoUrl: null,
    videoPath: null,
    cost: null,
    durationSeconds: null,
    generationTimeSeconds: null,
    width: null,
    height: null,
    createdAt: nowISO,
    updatedAt: nowISO,
    completedAt: null,
  };
}

function pick<T>(next: T | undefined, current: T): T {
  return next !== undefined ? next : current;
}

export function applyJobPatch(job: GenerationJob, patch: JobPatch, updatedAt: string): GenerationJob {
  return {
    ...job,
    status: pick(patch.status, job.status),
    providerJobId: pick(patch.providerJobId, job.providerJobId),
    errorMessage: pick(patch.errorMessage, job.errorMessage),
    videoUrl: pick(patch.videoUrl, job.videoUrl),
    videoPath: pick(patch.videoPath, job.videoPath),
    cost: pick(patch.cost, job.cost),
    durationSeconds: pick(patch.durationSeconds, job.durationSeconds),
    generationTimeSeconds: pick(patch.generationTimeSeconds, job.generationTimeSeconds),
    width: pick(patch.width, job.width),
    height: pick(patch.height, job.height),
    completedAt: pick(patch.completedAt, job.completedAt),
    updatedAt,
  };
}
