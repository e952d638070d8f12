/**
 * JSONL logging. Appends one JSON line per job lifecycle event.
 * debugLog prints only with DEBUG_JOBS=true.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";

export type JobEventType = "job.processing" | "job.submitted" | "job.completed" | "job.failed";

export interface JobEvent {
  tsISO: string;
  type: JobEventType;
  jobId: string;
  provider: string;
  model: string;
  providerJobId?: string;
  error?: string;
  cost?: number;
  generationTimeSeconds?: number;
}

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(
  path: string,
  event: unknown
): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const line = JSON.stringify(event) + "\n";
  await appendFile(path, line);
}

/** Sink for job events. The orchestrator never fails a job over a log write. */
export type JobEventSink = (event: JobEvent) => Promise<void>;

export function createJsonlJobEventSink(path: string): JobEventSink {
  return (event) => appendJsonl(path, event);
}

/** Read per call so tests can flip DEBUG_JOBS. */
export function debugLog(...args: unknown[]): void {
  if (process.env.DEBUG_JOBS === "true") {
    console.log(...args);
  }
}
