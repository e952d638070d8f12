/**
 * Provider registry: provider name → adapter constructor, plus the static
 * model → provider map used when a request names only a model.
 */

import { ValidationError } from "../errors.js";
import { KlingVideoAdapter } from "./klingAdapter.js";
import { OpenAIVideoAdapter } from "./openaiAdapter.js";
import { RunwayVideoAdapter } from "./runwayAdapter.js";
import type {
  ProviderAdapter,
  ProviderAdapterOptions,
  ProviderCapabilities,
  ProviderFactory,
  ProviderName,
} from "./types.js";

export const PROVIDERS: Readonly<Record<ProviderName, ProviderFactory>> = Object.freeze({
  openai: OpenAIVideoAdapter,
  runway: RunwayVideoAdapter,
  kling: KlingVideoAdapter,
});

export const MODEL_PROVIDER_MAP: Readonly<Record<string, ProviderName>> = Object.freeze({
  "sora-2": "openai",
  "sora-1": "openai",
  "runway-gen3": "runway",
  "runway-gen4": "runway",
  "kling-1.5": "kling",
  "kling-1.0": "kling",
});

export const DEFAULT_PROVIDER: ProviderName = "openai";

const DISPLAY_NAMES: Readonly<Record<ProviderName, string>> = {
  openai: "OpenAI",
  runway: "Runway",
  kling: "Kling",
};

export function isProviderName(name: string): name is ProviderName {
  return Object.hasOwn(PROVIDERS, name);
}

export function listProviderNames(): ProviderName[] {
  return Object.keys(PROVIDERS).filter(isProviderName);
}

/** Unknown models fall back to the default provider. */
export function getProviderForModel(model: string): ProviderName {
  return Object.hasOwn(MODEL_PROVIDER_MAP, model) ? MODEL_PROVIDER_MAP[model] : DEFAULT_PROVIDER;
}

export function createProvider(
  name: string,
  apiKey: string,
  options?: ProviderAdapterOptions
): ProviderAdapter {
  if (!isProviderName(name)) {
    const available = listProviderNames().join(", ");
    throw new ValidationError(`Unknown provider: ${name}. Available: ${available}`);
  }
  const Factory = PROVIDERS[name];
  return new Factory(apiKey, options);
}

export interface ProviderInfo {
  name: ProviderName;
  displayName: string;
  models: string[];
  features: ProviderCapabilities;
}

/** Capability discovery. Adapters are built with a placeholder key; nothing is called. */
export function listProviderInfo(): ProviderInfo[] {
  return listProviderNames().map((name) => {
    const adapter = createProvider(name, "");
    return {
      name,
      displayName: DISPLAY_NAMES[name],
      models: adapter.listModels(),
      features: adapter.getSupportedFeatures(),
    };
  });
}
