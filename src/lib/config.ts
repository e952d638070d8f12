/**
 * Gateway config: env-based getters with safe parsing and clamped defaults.
 * Read on each call so tests can override process.env.
 */

import { join } from "path";

export const DEFAULT_ENCRYPTION_KEY = "change-this-encryption-key";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function stringEnv(key: string, defaultVal: string): string {
  const raw = process.env[key];
  return raw == null || raw.trim() === "" ? defaultVal : raw.trim();
}

/** HTTP port. Default 3001. */
export function getPort(): number {
  return parseIntEnv("PORT", 3001, 1, 65_535);
}

export function getHost(): string {
  return stringEnv("HOST", "0.0.0.0");
}

/** Prefix for artifact URLs handed back to clients. */
export function getPublicBaseUrl(): string {
  return stringEnv("PUBLIC_BASE_URL", `http://localhost:${getPort()}`).replace(/\/$/, "");
}

/** Master key; provider secrets are encrypted with a key derived from it. */
export function getEncryptionKey(): string {
  return stringEnv("ENCRYPTION_KEY", DEFAULT_ENCRYPTION_KEY);
}

/** Directory artifacts are streamed into. Default ./storage/videos. */
export function getStoragePath(): string {
  return stringEnv("STORAGE_PATH", join(process.cwd(), "storage", "videos"));
}

export function getCorsOrigins(): string[] {
  return stringEnv("CORS_ORIGINS", "http://localhost:3000,http://localhost:5173")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);
}

/** Delay between status checks. Default 5000ms. */
export function getPollIntervalMs(): number {
  return parseIntEnv("POLL_INTERVAL_MS", 5000, 100, 60_000);
}

/** Status checks before a job times out. Default 60. */
export function getPollMaxAttempts(): number {
  return parseIntEnv("POLL_MAX_ATTEMPTS", 60, 1, 1000);
}

/** JSONL job event log. Default ./runs/jobs.jsonl. */
export function getJobLogPath(): string {
  return stringEnv("JOB_LOG_PATH", join(process.cwd(), "runs", "jobs.jsonl"));
}

export type PersistenceDriver = "db" | "memory";

/** PERSISTENCE_DRIVER=db uses PostgreSQL; anything else keeps state in memory. */
export function getPersistenceDriver(): PersistenceDriver {
  const v = process.env.PERSISTENCE_DRIVER?.trim().toLowerCase();
  if (v === "db") return "db";
  if (v && v !== "memory") {
    console.warn(`[Config] Unknown PERSISTENCE_DRIVER "${v}"; using memory`);
  }
  return "memory";
}

/** Max pooled PostgreSQL connections. Default 10. */
export function getDbPoolMax(): number {
  return parseIntEnv("DB_POOL_MAX", 10, 1, 100);
}
