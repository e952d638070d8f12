/**
 * Gateway services, built once from the environment and shared by the routes.
 */

import {
  getEncryptionKey,
  getJobLogPath,
  getPollIntervalMs,
  getPollMaxAttempts,
  getPublicBaseUrl,
  getStoragePath,
} from "../src/lib/config.js";
import {
  CredentialVault,
  EncryptionService,
  createCredentialStore,
  type AdapterFactory,
} from "../src/lib/credentials/index.js";
import {
  FileArtifactStorage,
  JobOrchestrator,
  createJobStore,
  type ArtifactStore,
  type JobStore,
} from "../src/lib/jobs/index.js";
import { createProvider } from "../src/lib/providers/index.js";
import { createJsonlJobEventSink } from "../src/logger.js";

export interface GatewayContext {
  vault: CredentialVault;
  jobs: JobStore;
  artifacts: ArtifactStore;
  orchestrator: JobOrchestrator;
  createAdapter: AdapterFactory;
}

let ctx: GatewayContext | null = null;

export function createGatewayContext(): GatewayContext {
  const jobs = createJobStore();
  const artifacts = new FileArtifactStorage(getStoragePath());
  return {
    vault: new CredentialVault(createCredentialStore(), new EncryptionService(getEncryptionKey())),
    jobs,
    artifacts,
    orchestrator: new JobOrchestrator({
      jobs,
      artifacts,
      publicBaseUrl: getPublicBaseUrl(),
      pollIntervalMs: getPollIntervalMs(),
      maxAttempts: getPollMaxAttempts(),
      events: createJsonlJobEventSink(getJobLogPath()),
    }),
    createAdapter: createProvider,
  };
}

export function getGatewayContext(): GatewayContext {
  if (!ctx) ctx = createGatewayContext();
  return ctx;
}

/** Replaces the shared context (tests) or clears it with null. */
export function setGatewayContext(next: GatewayContext | null): void {
  ctx = next;
}
