/**
 * OpenAI Sora adapter over the Videos API:
 * - POST /v1/videos                  create
 * - GET  /v1/videos/{id}             status
 * - GET  /v1/videos/{id}/content     download (same bearer key)
 *
 * validateKey() lists models through the SDK.
 */

import OpenAI from "openai";
import {
  STATUS_TIMEOUT_MS,
  SUBMIT_TIMEOUT_MS,
  VALIDATE_TIMEOUT_MS,
  asString,
  bearer,
  failedOutcome,
  isRecord,
  normalizeStatus,
  requestJson,
  type ErrorEnvelopeParser,
} from "./http.js";
import type {
  GenerationOutcome,
  GenerationRequest,
  ProviderAdapter,
  ProviderAdapterOptions,
  ProviderCapabilities,
} from "./types.js";

export const OPENAI_BASE_URL = "https://api.openai.com/v1";
export const OPENAI_DEFAULT_MODEL = "sora-2";

const SIZE_BY_ASPECT_RATIO: Readonly<Record<string, string>> = {
  "9:16": "720x1280",
  "16:9": "1280x720",
  "1:1": "1024x1024",
};
const DEFAULT_SIZE = "1280x720";

const STATUS_MAP = {
  queued: "processing",
  processing: "processing",
  completed: "completed",
  failed: "failed",
  cancelled: "failed",
} as const;

const FEATURES: ProviderCapabilities = Object.freeze({
  supportsDuration: true,
  supportsAspectRatio: true,
  supportsSeed: false,
  supportsFps: false,
  supportsImageToVideo: true,
  supportsVideoToVideo: true,
  maxDuration: 20,
  availableAspectRatios: Object.freeze(["16:9", "9:16", "1:1"]),
});

/** {"error": {"message": "..."}} */
export const parseOpenAIError: ErrorEnvelopeParser = (body) => {
  if (isRecord(body) && isRecord(body.error)) {
    return asString(body.error.message);
  }
  return undefined;
};

export function sizeForAspectRatio(aspectRatio: string): string {
  return Object.hasOwn(SIZE_BY_ASPECT_RATIO, aspectRatio) ? SIZE_BY_ASPECT_RATIO[aspectRatio] : DEFAULT_SIZE;
}

export class OpenAIVideoAdapter implements ProviderAdapter {
  readonly name = "openai" as const;
  readonly models = Object.freeze(["sora-2", "sora-1"]);
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string,
    options: ProviderAdapterOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? OPENAI_BASE_URL).replace(/\/$/, "");
  }

  async validateKey(): Promise<boolean> {
    try {
      const client = new OpenAI({
        apiKey: this.apiKey,
        baseURL: this.baseUrl,
        maxRetries: 0,
        timeout: VALIDATE_TIMEOUT_MS,
      });
      await client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  buildPayload(req: GenerationRequest): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      prompt: req.prompt,
      model: req.model ?? OPENAI_DEFAULT_MODEL,
    };
    if (req.duration) {
      payload.seconds = String(req.duration);
    }
    if (req.aspectRatio) {
      payload.size = sizeForAspectRatio(req.aspectRatio);
    }
    return payload;
  }

  async generateVideo(req: GenerationRequest): Promise<GenerationOutcome> {
    try {
      const data = await requestJson(`${this.baseUrl}/videos`, {
        method: "POST",
        apiKey: this.apiKey,
        timeoutMs: SUBMIT_TIMEOUT_MS,
        body: this.buildPayload(req),
      });
      const id = asString(data.id);
      if (!id) {
        return { jobId: "", status: "failed", error: "Provider response missing video id" };
      }
      // "queued" on creation; normalized to processing until the first status check
      return { jobId: id, status: "processing", metadata: data };
    } catch (e) {
      return failedOutcome("", e, parseOpenAIError);
    }
  }

  async checkStatus(remoteJobId: string): Promise<GenerationOutcome> {
    const id = encodeURIComponent(remoteJobId);
    try {
      const data = await requestJson(`${this.baseUrl}/videos/${id}`, {
        method: "GET",
        apiKey: this.apiKey,
        timeoutMs: STATUS_TIMEOUT_MS,
      });
      const status = normalizeStatus(STATUS_MAP, data.status);
      if (status !== "completed") {
        const error = status === "failed" ? parseOpenAIError(data) : undefined;
        return { jobId: remoteJobId, status, metadata: data, ...(error ? { error } : {}) };
      }
      return {
        jobId: remoteJobId,
        status,
        videoUrl: `${this.baseUrl}/videos/${id}/content`,
        metadata: data,
        downloadHeaders: bearer(this.apiKey),
      };
    } catch (e) {
      return failedOutcome(remoteJobId, e, parseOpenAIError);
    }
  }

  getSupportedFeatures(): ProviderCapabilities {
    return FEATURES;
  }

  listModels(): string[] {
    return [...this.models];
  }
}
