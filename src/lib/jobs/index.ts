/**
 * Generation jobs: records, storage drivers, artifacts and the orchestrator.
 */

import { getPersistenceDriver } from "../config.js";
import { DbJobStore } from "./dbJobStore.js";
import { InMemoryJobStore } from "./memoryJobStore.js";
import type { JobStore } from "./types.js";

export type {
  GenerationJob,
  JobParameters,
  JobPatch,
  JobQuery,
  JobStatus,
  JobStore,
  NewJob,
} from "./types.js";
export {
  JOB_STATUSES,
  JobStateError,
  TERMINAL_JOB_STATUSES,
  isTerminalStatus,
  newJobId,
  toJobStatus,
} from "./types.js";
export { InMemoryJobStore } from "./memoryJobStore.js";
export { DbJobStore } from "./dbJobStore.js";
export { FileArtifactStorage, ArtifactDownloadError, VIDEOS_ROUTE } from "./artifactStorage.js";
export type { ArtifactDownloader, ArtifactStore } from "./artifactStorage.js";
export { JobOrchestrator, GENERATION_TIMEOUT_ERROR, GENERATION_FAILED_ERROR } from "./orchestrator.js";
export type { JobOrchestratorDeps, TrackOptions } from "./orchestrator.js";
export { toJobView } from "./jobView.js";
export type { JobView } from "./jobView.js";
export { computeUsageStats, getUsageStats } from "./usageStats.js";
export type { UsageStats, UsageBucket } from "./usageStats.js";

export function createJobStore(): JobStore {
  return getPersistenceDriver() === "db" ? new DbJobStore() : new InMemoryJobStore();
}
