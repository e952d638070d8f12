/**
 * Provider abstraction: one adapter per remote video API, normalized to a
 * single request/outcome shape and a three-value status vocabulary.
 */

export type ProviderName = "openai" | "runway" | "kling";

export type NormalizedStatus = "processing" | "completed" | "failed";

export interface GenerationRequest {
  prompt: string;
  model?: string;
  /** Seconds. */
  duration?: number;
  aspectRatio?: string;
  seed?: number;
  fps?: number;
  resolution?: string;
}

export interface GenerationOutcome {
  /** Remote job id; empty when submission failed before one was issued. */
  jobId: string;
  status: NormalizedStatus;
  videoUrl?: string;
  error?: string;
  metadata?: Record<string, unknown>;
  /**
   * Headers the artifact download must send. Carries the provider secret for
   * authenticated downloads, so callers must never persist or log it.
   */
  downloadHeaders?: Record<string, string>;
}

export interface ProviderCapabilities {
  supportsDuration: boolean;
  supportsAspectRatio: boolean;
  supportsSeed: boolean;
  supportsFps: boolean;
  supportsImageToVideo: boolean;
  supportsVideoToVideo: boolean;
  maxDuration: number;
  availableAspectRatios: readonly string[];
}

/**
 * validateKey, generateVideo and checkStatus never reject: every transport,
 * HTTP or parsing failure comes back as `false` or a failed outcome.
 */
export interface ProviderAdapter {
  readonly name: ProviderName;
  readonly models: readonly string[];
  validateKey(): Promise<boolean>;
  generateVideo(req: GenerationRequest): Promise<GenerationOutcome>;
  checkStatus(remoteJobId: string): Promise<GenerationOutcome>;
  getSupportedFeatures(): ProviderCapabilities;
  listModels(): string[];
}

export interface ProviderAdapterOptions {
  /** Override the provider base URL (proxies, tests). */
  baseUrl?: string;
}

export type ProviderFactory = new (apiKey: string, options?: ProviderAdapterOptions) => ProviderAdapter;
