/**
 * Usage aggregation over stored jobs.
 */

import { toJobView, type JobView } from "./jobView.js";
import type { GenerationJob, JobStore } from "./types.js";

export const RECENT_JOBS_LIMIT = 10;

export interface UsageBucket {
  count: number;
  completed: number;
  failed: number;
  totalCost: number;
}

export interface UsageStats {
  totalGenerations: number;
  completed: number;
  failed: number;
  inProgress: number;
  /** completed / totalGenerations, 0 for an empty store. */
  successRate: number;
  totalCost: number;
  totalVideoSeconds: number;
  averageGenerationTimeSeconds: number | null;
  byProvider: Record<string, UsageBucket>;
  byModel: Record<string, UsageBucket>;
  recent: JobView[];
}

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

function addTo(buckets: Record<string, UsageBucket>, key: string, job: GenerationJob): void {
  const b = buckets[key] ?? { count: 0, completed: 0, failed: 0, totalCost: 0 };
  b.count++;
  if (job.status === "completed") b.completed++;
  if (job.status === "failed") b.failed++;
  b.totalCost = round4(b.totalCost + (job.cost ?? 0));
  buckets[key] = b;
}

/** Jobs must be newest first, as JobStore.list returns them. */
export function computeUsageStats(jobs: GenerationJob[]): UsageStats {
  const byProvider: Record<string, UsageBucket> = {};
  const byModel: Record<string, UsageBucket> = {};
  let completed = 0;
  let failed = 0;
  let inProgress = 0;
  let totalCost = 0;
  let totalVideoSeconds = 0;
  let timeSum = 0;
  let timed = 0;

  for (const job of jobs) {
    addTo(byProvider, job.provider, job);
    addTo(byModel, job.model, job);
    if (job.status === "completed") {
      completed++;
      totalVideoSeconds += job.durationSeconds ?? 0;
      if (job.generationTimeSeconds != null) {
        timeSum += job.generationTimeSeconds;
        timed++;
      }
    } else if (job.status === "failed") {
      failed++;
    } else if (job.status === "queued" || job.status === "processing") {
      inProgress++;
    }
    totalCost += job.cost ?? 0;
  }

  return {
    totalGenerations: jobs.length,
    completed,
    failed,
    inProgress,
    successRate: jobs.length > 0 ? round4(completed / jobs.length) : 0,
    totalCost: round4(totalCost),
    totalVideoSeconds: round4(totalVideoSeconds),
    averageGenerationTimeSeconds: timed > 0 ? round4(timeSum / timed) : null,
    byProvider,
    byModel,
    recent: jobs.slice(0, RECENT_JOBS_LIMIT).map(toJobView),
  };
}

export async function getUsageStats(store: JobStore): Promise<UsageStats> {
  return computeUsageStats(await store.list());
}
