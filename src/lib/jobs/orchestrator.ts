/**
 * Drives a generation job from QUEUED to a terminal state: submit to the
 * provider, poll until it settles, store the artifact, price the result.
 *
 * One fire-and-forget task per job. A failure inside a task ends as a FAILED
 * record unless the job was cancelled or settled elsewhere; nothing escapes to
 * the caller.
 */

import { setTimeout as delay } from "timers/promises";
import { errorMessage } from "../errors.js";
import { calculateCost, parseResolution } from "../pricing/costEstimator.js";
import { maskSecret } from "../credentials/vault.js";
import type { GenerationOutcome, GenerationRequest, ProviderAdapter } from "../providers/types.js";
import { debugLog, type JobEvent, type JobEventSink, type JobEventType } from "../../logger.js";
import type { ArtifactStore } from "./artifactStorage.js";
import { isTerminalStatus, JobStateError, type GenerationJob, type JobPatch, type JobStore } from "./types.js";

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_MAX_ATTEMPTS = 60;
export const FALLBACK_WIDTH = 1280;
export const FALLBACK_HEIGHT = 720;

export const GENERATION_TIMEOUT_ERROR = "Generation timeout";
export const GENERATION_FAILED_ERROR = "Generation failed";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface JobOrchestratorDeps {
  jobs: JobStore;
  artifacts: ArtifactStore;
  /** Prefix for stored video paths, e.g. http://localhost:3001 */
  publicBaseUrl: string;
  pollIntervalMs?: number;
  maxAttempts?: number;
  events?: JobEventSink;
  now?: () => Date;
  sleep?: Sleep;
}

export interface TrackOptions {
  /** Aborting stops polling without writing; the caller owns the CANCELLED write. */
  signal?: AbortSignal;
}

export interface ResultDimensions {
  width: number;
  height: number;
  durationSeconds: number;
}

const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    if (signal?.aborted) return;
    throw e;
  }
};

function positiveNumber(raw: unknown): number | undefined {
  const n = typeof raw === "number" ? raw : typeof raw === "string" && raw.trim() !== "" ? Number(raw) : NaN;
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Reads width, height and duration from provider metadata. Anything missing
 * or malformed falls back to 1280x720 and the requested duration.
 */
export function resultDimensions(
  metadata: Record<string, unknown> | undefined,
  requestedDuration: number
): ResultDimensions {
  const m = metadata ?? {};
  let width = positiveNumber(m.width);
  let height = positiveNumber(m.height);
  if (width === undefined || height === undefined) {
    const text = typeof m.size === "string" ? m.size : typeof m.resolution === "string" ? m.resolution : "";
    const parsed = parseResolution(text);
    width = parsed && parsed.width > 0 ? parsed.width : undefined;
    height = parsed && parsed.height > 0 ? parsed.height : undefined;
  }
  return {
    width: width !== undefined && height !== undefined ? Math.round(width) : FALLBACK_WIDTH,
    height: width !== undefined && height !== undefined ? Math.round(height) : FALLBACK_HEIGHT,
    durationSeconds: positiveNumber(m.duration) ?? positiveNumber(m.seconds) ?? requestedDuration,
  };
}

/** Replaces any occurrence of the secret with its masked preview. */
export function redactSecret(message: string, secret: string): string {
  if (!secret) return message;
  return message.split(secret).join(maskSecret(secret));
}

export class JobOrchestrator {
  private readonly jobs: JobStore;
  private readonly artifacts: ArtifactStore;
  private readonly publicBaseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly maxAttempts: number;
  private readonly events?: JobEventSink;
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly controllers = new Map<string, AbortController>();

  constructor(deps: JobOrchestratorDeps) {
    this.jobs = deps.jobs;
    this.artifacts = deps.artifacts;
    this.publicBaseUrl = deps.publicBaseUrl.replace(/\/+$/, "");
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.events = deps.events;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Starts the job's task in the background and returns immediately. */
  submitAndTrackJob(
    job: GenerationJob,
    adapter: ProviderAdapter,
    secret: string,
    request: GenerationRequest,
    options: TrackOptions = {}
  ): void {
    const controller = new AbortController();
    const external = options.signal;
    const forwardAbort = () => controller.abort();
    if (external?.aborted) controller.abort();
    else external?.addEventListener("abort", forwardAbort, { once: true });
    this.controllers.set(job.id, controller);
    const task = this.runJob(job, adapter, secret, request, { signal: controller.signal }).finally(() => {
      external?.removeEventListener("abort", forwardAbort);
      this.inFlight.delete(job.id);
      this.controllers.delete(job.id);
    });
    this.inFlight.set(job.id, task);
  }

  /** Stops polling a tracked job. Returns false when the job is not tracked. */
  cancel(jobId: string): boolean {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  /** Awaited form of submitAndTrackJob. Never rejects. */
  async runJob(
    job: GenerationJob,
    adapter: ProviderAdapter,
    secret: string,
    request: GenerationRequest,
    options: TrackOptions = {}
  ): Promise<void> {
    try {
      await this.drive(job, adapter, secret, request, options.signal);
    } catch (e) {
      if (e instanceof JobStateError || options.signal?.aborted) {
        debugLog(`[Jobs] ${job.id} stopped: ${errorMessage(e)}`);
        return;
      }
      await this.failSafely(job, redactSecret(errorMessage(e), secret));
    }
  }

  activeJobIds(): string[] {
    return [...this.inFlight.keys()];
  }

  /** Resolves once every task started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  private async drive(
    job: GenerationJob,
    adapter: ProviderAdapter,
    secret: string,
    request: GenerationRequest,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const current = await this.jobs.get(job.id);
    if (!current) {
      debugLog(`[Jobs] ${job.id} no longer exists; skipping`);
      return;
    }
    if (isTerminalStatus(current.status) || signal?.aborted) {
      debugLog(`[Jobs] ${job.id} is ${current.status}; not starting`);
      return;
    }

    await this.write(job.id, { status: "processing" });
    await this.emit("job.processing", job);

    const startedAt = this.now();
    const submitted = await adapter.generateVideo(request);
    if (submitted.status === "failed") {
      await this.fail(job, redactSecret(submitted.error ?? GENERATION_FAILED_ERROR, secret));
      return;
    }

    await this.write(job.id, { providerJobId: submitted.jobId });
    await this.emit("job.submitted", job, { providerJobId: submitted.jobId });

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      await this.sleep(this.pollIntervalMs, signal);
      if (signal?.aborted) {
        debugLog(`[Jobs] ${job.id} aborted before attempt ${attempt}`);
        return;
      }

      const outcome = await adapter.checkStatus(submitted.jobId);
      debugLog(`[Jobs] ${job.id} attempt ${attempt}/${this.maxAttempts}: ${outcome.status}`);

      if (outcome.status === "completed") {
        await this.complete(job, request, outcome, startedAt, signal);
        return;
      }
      if (outcome.status === "failed") {
        await this.fail(job, redactSecret(outcome.error ?? GENERATION_FAILED_ERROR, secret));
        return;
      }
    }

    await this.fail(job, GENERATION_TIMEOUT_ERROR);
  }

  private async complete(
    job: GenerationJob,
    request: GenerationRequest,
    outcome: GenerationOutcome,
    startedAt: Date,
    signal: AbortSignal | undefined
  ): Promise<void> {
    let videoPath: string | null = null;
    let videoUrl: string | null = null;
    if (outcome.videoUrl) {
      videoPath = await this.artifacts.download(
        outcome.videoUrl,
        `${job.id}.mp4`,
        outcome.downloadHeaders,
        signal
      );
      videoUrl = `${this.publicBaseUrl}${videoPath}`;
    } else {
      console.warn(`[Jobs] ${job.id} completed without a video URL`);
    }

    const dims = resultDimensions(outcome.metadata, request.duration ?? job.parameters.duration);
    const cost = calculateCost(job.provider, job.model, dims.durationSeconds, `${dims.width}x${dims.height}`);
    const finishedAt = this.now();
    const generationTimeSeconds = (finishedAt.getTime() - startedAt.getTime()) / 1000;

    try {
      await this.write(job.id, {
        status: "completed",
        videoPath,
        videoUrl,
        width: dims.width,
        height: dims.height,
        durationSeconds: dims.durationSeconds,
        cost,
        generationTimeSeconds,
        completedAt: finishedAt.toISOString(),
      });
    } catch (e) {
      // no record will point at the file
      if (videoPath) await this.discardArtifact(job, videoPath);
      throw e;
    }
    await this.emit("job.completed", job, { cost, generationTimeSeconds });
  }

  private async discardArtifact(job: GenerationJob, videoPath: string): Promise<void> {
    try {
      await this.artifacts.delete(videoPath);
    } catch (e) {
      console.warn(`[Jobs] Could not remove ${videoPath} for ${job.id}: ${errorMessage(e)}`);
    }
  }

  private async fail(job: GenerationJob, message: string): Promise<void> {
    await this.write(job.id, { status: "failed", errorMessage: message });
    await this.emit("job.failed", job, { error: message });
  }

  private async failSafely(job: GenerationJob, message: string): Promise<void> {
    try {
      await this.fail(job, message);
    } catch (e) {
      console.error(`[Jobs] Could not record failure for ${job.id}: ${errorMessage(e)}`);
    }
  }

  private async write(id: string, patch: JobPatch): Promise<GenerationJob> {
    const updated = await this.jobs.update(id, patch);
    if (!updated) {
      throw new Error(`Job ${id} not found`);
    }
    return updated;
  }

  private async emit(
    type: JobEventType,
    job: GenerationJob,
    extra: Pick<JobEvent, "providerJobId" | "error" | "cost" | "generationTimeSeconds"> = {}
  ): Promise<void> {
    if (!this.events) return;
    try {
      await this.events({
        tsISO: this.now().toISOString(),
        type,
        jobId: job.id,
        provider: job.provider,
        model: job.model,
        ...extra,
      });
    } catch (e) {
      console.warn(`[Jobs] Failed to write ${type} event for ${job.id}: ${errorMessage(e)}`);
    }
  }
}
