/**
 * Kling AI adapter. Submissions return a task id; status lives under task_status
 * and the artifact under task_result.video_url.
 */

import {
  STATUS_TIMEOUT_MS,
  SUBMIT_TIMEOUT_MS,
  asString,
  failedOutcome,
  isRecord,
  normalizeStatus,
  probeKey,
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

export const KLING_BASE_URL = "https://api.klingai.com/v1";

const REMOTE_MODEL_BY_MODEL: Readonly<Record<string, string>> = {
  "kling-1.5": "kling-v1.5",
  "kling-1.0": "kling-v1",
};

const STATUS_MAP = {
  pending: "processing",
  running: "processing",
  success: "completed",
  failed: "failed",
} as const;

const FEATURES: ProviderCapabilities = Object.freeze({
  supportsDuration: true,
  supportsAspectRatio: true,
  supportsSeed: true,
  supportsFps: true,
  supportsImageToVideo: true,
  supportsVideoToVideo: true,
  maxDuration: 10,
  availableAspectRatios: Object.freeze(["16:9", "9:16", "1:1"]),
});

/** {"code": 1001, "message": "..."} */
export const parseKlingError: ErrorEnvelopeParser = (body) => {
  if (isRecord(body)) return asString(body.message);
  return undefined;
};

export class KlingVideoAdapter implements ProviderAdapter {
  readonly name = "kling" as const;
  readonly models = Object.freeze(["kling-1.5", "kling-1.0"]);
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string,
    options: ProviderAdapterOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? KLING_BASE_URL).replace(/\/$/, "");
  }

  validateKey(): Promise<boolean> {
    return probeKey(`${this.baseUrl}/account`, this.apiKey);
  }

  buildPayload(req: GenerationRequest): Record<string, unknown> {
    const remoteModel = req.model && Object.hasOwn(REMOTE_MODEL_BY_MODEL, req.model)
      ? REMOTE_MODEL_BY_MODEL[req.model]
      : "kling-v1.5";
    const payload: Record<string, unknown> = { prompt: req.prompt, model: remoteModel };
    if (req.duration) payload.duration = req.duration;
    if (req.aspectRatio) payload.aspect_ratio = req.aspectRatio;
    if (req.seed) payload.seed = req.seed;
    return payload;
  }

  async generateVideo(req: GenerationRequest): Promise<GenerationOutcome> {
    try {
      const data = await requestJson(`${this.baseUrl}/videos/generations`, {
        method: "POST",
        apiKey: this.apiKey,
        timeoutMs: SUBMIT_TIMEOUT_MS,
        body: this.buildPayload(req),
      });
      const id = asString(data.task_id) ?? asString(data.id);
      if (!id) {
        return { jobId: "", status: "failed", error: "Provider response missing task id" };
      }
      return { jobId: id, status: "processing", metadata: data };
    } catch (e) {
      return failedOutcome("", e, parseKlingError);
    }
  }

  async checkStatus(remoteJobId: string): Promise<GenerationOutcome> {
    try {
      const data = await requestJson(`${this.baseUrl}/videos/generations/${encodeURIComponent(remoteJobId)}`, {
        method: "GET",
        apiKey: this.apiKey,
        timeoutMs: STATUS_TIMEOUT_MS,
      });
      const status = normalizeStatus(STATUS_MAP, data.task_status);
      if (status === "completed") {
        const videoUrl = isRecord(data.task_result) ? asString(data.task_result.video_url) : undefined;
        return { jobId: remoteJobId, status, metadata: data, ...(videoUrl ? { videoUrl } : {}) };
      }
      const error = status === "failed" ? asString(data.task_status_msg) : undefined;
      return { jobId: remoteJobId, status, metadata: data, ...(error ? { error } : {}) };
    } catch (e) {
      return failedOutcome(remoteJobId, e, parseKlingError);
    }
  }

  getSupportedFeatures(): ProviderCapabilities {
    return FEATURES;
  }

  listModels(): string[] {
    return [...this.models];
  }
}
