/**
 * Public JSON shape of a generation job.
 */

import type { GenerationJob, JobParameters, JobStatus } from "./types.js";

export interface JobView {
  id: string;
  object: "video.generation";
  /** Unix seconds. */
  created: number;
  model: string;
  provider: string;
  status: JobStatus;
  prompt: string;
  parameters: JobParameters;
  video: { url: string | null; duration: number | null; width: number | null; height: number | null } | null;
  usage: { cost: number | null; timeSeconds: number | null } | null;
  error: string | null;
  completedAt: string | null;
}

export function toJobView(job: GenerationJob): JobView {
  const completed = job.status === "completed";
  return {
    id: job.id,
    object: "video.generation",
    created: Math.floor(Date.parse(job.createdAt) / 1000),
    model: job.model,
    provider: job.provider,
    status: job.status,
    prompt: job.prompt,
    parameters: { ...job.parameters },
    video: completed
      ? { url: job.videoUrl, duration: job.durationSeconds, width: job.width, height: job.height }
      : null,
    usage: completed ? { cost: job.cost, timeSeconds: job.generationTimeSeconds } : null,
    error: job.errorMessage,
    completedAt: job.completedAt,
  };
}
