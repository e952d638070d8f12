/**
 * Runway Gen-3/Gen-4 adapter. Runway takes explicit pixel dimensions, so the
 * aspect ratio is expanded to width/height before submission.
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

export const RUNWAY_BASE_URL = "https://api.runwayml.com/v1";

const DIMENSIONS_BY_ASPECT_RATIO: Readonly<Record<string, readonly [number, number]>> = {
  "16:9": [1920, 1080],
  "9:16": [1080, 1920],
  "1:1": [1080, 1080],
  "4:3": [1440, 1080],
  "21:9": [2560, 1080],
};
const DEFAULT_DIMENSIONS = [1920, 1080] as const;

const REMOTE_MODEL_BY_MODEL: Readonly<Record<string, string>> = {
  "runway-gen3": "gen3",
  "runway-gen4": "gen4",
};

const STATUS_MAP = {
  pending: "processing",
  processing: "processing",
  succeeded: "completed",
  failed: "failed",
} as const;

const FEATURES: ProviderCapabilities = Object.freeze({
  supportsDuration: true,
  supportsAspectRatio: true,
  supportsSeed: true,
  supportsFps: false,
  supportsImageToVideo: true,
  supportsVideoToVideo: false,
  maxDuration: 10,
  availableAspectRatios: Object.freeze(["16:9", "9:16", "1:1", "4:3"]),
});

/** {"error": "..."} or {"error": {"message": "..."}} */
export const parseRunwayError: ErrorEnvelopeParser = (body) => {
  if (!isRecord(body)) return undefined;
  if (isRecord(body.error)) return asString(body.error.message);
  return asString(body.error);
};

export function dimensionsForAspectRatio(aspectRatio: string): readonly [number, number] {
  return Object.hasOwn(DIMENSIONS_BY_ASPECT_RATIO, aspectRatio)
    ? DIMENSIONS_BY_ASPECT_RATIO[aspectRatio]
    : DEFAULT_DIMENSIONS;
}

export class RunwayVideoAdapter implements ProviderAdapter {
  readonly name = "runway" as const;
  readonly models = Object.freeze(["runway-gen3", "runway-gen4"]);
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string,
    options: ProviderAdapterOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? RUNWAY_BASE_URL).replace(/\/$/, "");
  }

  validateKey(): Promise<boolean> {
    return probeKey(`${this.baseUrl}/teams`, this.apiKey);
  }

  buildPayload(req: GenerationRequest): Record<string, unknown> {
    const remoteModel = req.model && Object.hasOwn(REMOTE_MODEL_BY_MODEL, req.model)
      ? REMOTE_MODEL_BY_MODEL[req.model]
      : "gen3";
    const payload: Record<string, unknown> = { prompt: req.prompt, model: remoteModel };
    if (req.duration) {
      payload.duration = req.duration;
    }
    if (req.aspectRatio) {
      const [width, height] = dimensionsForAspectRatio(req.aspectRatio);
      payload.width = width;
      payload.height = height;
    }
    if (req.seed) {
      payload.seed = req.seed;
    }
    return payload;
  }

  async generateVideo(req: GenerationRequest): Promise<GenerationOutcome> {
    try {
      const data = await requestJson(`${this.baseUrl}/generations`, {
        method: "POST",
        apiKey: this.apiKey,
        timeoutMs: SUBMIT_TIMEOUT_MS,
        body: this.buildPayload(req),
      });
      const id = asString(data.id);
      if (!id) {
        return { jobId: "", status: "failed", error: "Provider response missing generation id" };
      }
      return { jobId: id, status: "processing", metadata: data };
    } catch (e) {
      return failedOutcome("", e, parseRunwayError);
    }
  }

  async checkStatus(remoteJobId: string): Promise<GenerationOutcome> {
    try {
      const data = await requestJson(`${this.baseUrl}/generations/${encodeURIComponent(remoteJobId)}`, {
        method: "GET",
        apiKey: this.apiKey,
        timeoutMs: STATUS_TIMEOUT_MS,
      });
      const status = normalizeStatus(STATUS_MAP, data.status);
      if (status === "completed") {
        const videoUrl = isRecord(data.output) ? asString(data.output.url) : undefined;
        return { jobId: remoteJobId, status, metadata: data, ...(videoUrl ? { videoUrl } : {}) };
      }
      const error = status === "failed" ? parseRunwayError(data) ?? asString(data.failure) : undefined;
      return { jobId: remoteJobId, status, metadata: data, ...(error ? { error } : {}) };
    } catch (e) {
      return failedOutcome(remoteJobId, e, parseRunwayError);
    }
  }

  getSupportedFeatures(): ProviderCapabilities {
    return FEATURES;
  }

  listModels(): string[] {
    return [...this.models];
  }
}
