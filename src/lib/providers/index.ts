/**
 * Video providers: adapters, registry and model routing.
 */

export type {
  GenerationOutcome,
  GenerationRequest,
  NormalizedStatus,
  ProviderAdapter,
  ProviderAdapterOptions,
  ProviderCapabilities,
  ProviderFactory,
  ProviderName,
} from "./types.js";

export { OpenAIVideoAdapter } from "./openaiAdapter.js";
export { RunwayVideoAdapter } from "./runwayAdapter.js";
export { KlingVideoAdapter } from "./klingAdapter.js";

export {
  PROVIDERS,
  MODEL_PROVIDER_MAP,
  DEFAULT_PROVIDER,
  createProvider,
  getProviderForModel,
  isProviderName,
  listProviderInfo,
  listProviderNames,
} from "./registry.js";
export type { ProviderInfo } from "./registry.js";
