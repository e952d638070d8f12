/**
 * Shared HTTP plumbing for provider adapters: bearer-authenticated JSON calls,
 * per-call timeouts, and conversion of failures into failed outcomes.
 */

import { errorMessage } from "../errors.js";
import type { GenerationOutcome } from "./types.js";

export const VALIDATE_TIMEOUT_MS = 10_000;
export const SUBMIT_TIMEOUT_MS = 300_000;
export const STATUS_TIMEOUT_MS = 30_000;
export const ARTIFACT_TIMEOUT_MS = 300_000;

/** Non-2xx provider response. Body kept raw for envelope parsing. */
export class ProviderHttpError extends Error {
  override readonly name = "ProviderHttpError";

  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`HTTP ${status}: ${body}`);
  }
}

/** Pulls a human-readable message out of a provider's error body. */
export type ErrorEnvelopeParser = (body: unknown) => string | undefined;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  if (typeof v === "string" && v !== "") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return undefined;
}

export function bearer(apiKey: string): Record<string, string> {
  return { Authorization: `Bearer ${apiKey}` };
}

export interface JsonRequest {
  method: "GET" | "POST";
  apiKey: string;
  timeoutMs: number;
  body?: Record<string, unknown>;
}

/**
 * Issues the call and returns the parsed JSON object.
 * Throws ProviderHttpError on non-2xx, Error on transport failure or a non-object body.
 */
export async function requestJson(url: string, req: JsonRequest): Promise<Record<string, unknown>> {
  const headers: Record<string, string> = bearer(req.apiKey);
  if (req.body !== undefined) {
    headers["Content-Type"] = "application/json";
  }
  const res = await fetch(url, {
    method: req.method,
    headers,
    body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
    signal: AbortSignal.timeout(req.timeoutMs),
  });
  const text = await res.text();
  if (!res.ok) {
    throw new ProviderHttpError(res.status, text);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error(`Malformed response from provider: ${text.slice(0, 200)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error("Malformed response from provider: expected a JSON object");
  }
  return parsed;
}

/** Lightweight authenticated GET. True only on 2xx; never throws. */
export async function probeKey(url: string, apiKey: string): Promise<boolean> {
  try {
    const res = await fetch(url, {
      method: "GET",
      headers: bearer(apiKey),
      signal: AbortSignal.timeout(VALIDATE_TIMEOUT_MS),
    });
    return res.ok;
  } catch {
    return false;
  }
}

/** "HTTP <code>: <message>", preferring the parsed envelope over the raw body. */
export function formatHttpError(err: ProviderHttpError, parseEnvelope: ErrorEnvelopeParser): string {
  let detail = err.body;
  try {
    const msg = parseEnvelope(JSON.parse(err.body));
    if (msg) detail = msg;
  } catch {
    // not JSON: keep the raw body
  }
  return `HTTP ${err.status}: ${detail}`;
}

export function failedOutcome(
  jobId: string,
  e: unknown,
  parseEnvelope: ErrorEnvelopeParser
): GenerationOutcome {
  const error = e instanceof ProviderHttpError ? formatHttpError(e, parseEnvelope) : errorMessage(e);
  return { jobId, status: "failed", error };
}

/**
 * Maps a native status through a fixed table. Unknown or missing values are
 * treated as still running.
 */
export function normalizeStatus(
  table: Readonly<Record<string, "processing" | "completed" | "failed">>,
  native: unknown
): "processing" | "completed" | "failed" {
  if (typeof native === "string" && Object.hasOwn(table, native)) {
    return table[native];
  }
  return "processing";
}
