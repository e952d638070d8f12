import { describe, it, expect } from "vitest";
import {
  MODEL_PROVIDER_MAP,
  createProvider,
  getProviderForModel,
  isProviderName,
  listProviderInfo,
  listProviderNames,
} from "../registry.js";
import { OpenAIVideoAdapter } from "../openaiAdapter.js";
import { RunwayVideoAdapter } from "../runwayAdapter.js";
import { KlingVideoAdapter } from "../klingAdapter.js";
import { ValidationError } from "../../errors.js";

describe("getProviderForModel", () => {
  it("maps every known model to its provider", () => {
    expect(MODEL_PROVIDER_MAP).toEqual({
      "sora-2": "openai",
      "sora-1": "openai",
      "runway-gen3": "runway",
      "runway-gen4": "runway",
      "kling-1.5": "kling",
      "kling-1.0": "kling",
    });
    expect(getProviderForModel("runway-gen4")).toBe("runway");
    expect(getProviderForModel("kling-1.0")).toBe("kling");
  });

  it("falls back to openai for unknown models", () => {
    expect(getProviderForModel("veo-3")).toBe("openai");
    expect(getProviderForModel("constructor")).toBe("openai");
  });
});

describe("createProvider", () => {
  it("builds the adapter registered for each name", () => {
    expect(createProvider("openai", "k")).toBeInstanceOf(OpenAIVideoAdapter);
    expect(createProvider("runway", "k")).toBeInstanceOf(RunwayVideoAdapter);
    expect(createProvider("kling", "k")).toBeInstanceOf(KlingVideoAdapter);
  });

  it("rejects unknown providers with a ValidationError", () => {
    expect(() => createProvider("pika", "k")).toThrow(ValidationError);
    expect(() => createProvider("pika", "k")).toThrow("Unknown provider: pika. Available: openai, runway, kling");
  });

  it("every model an adapter lists routes back to that adapter", () => {
    for (const name of listProviderNames()) {
      for (const model of createProvider(name, "k").listModels()) {
        expect(getProviderForModel(model)).toBe(name);
      }
    }
  });
});

describe("listProviderInfo", () => {
  it("describes all providers in registry order", () => {
    const info = listProviderInfo();
    expect(info.map((p) => p.name)).toEqual(["openai", "runway", "kling"]);
    expect(info.map((p) => p.displayName)).toEqual(["OpenAI", "Runway", "Kling"]);
    expect(info[2].models).toEqual(["kling-1.5", "kling-1.0"]);
    expect(info[2].features.supportsFps).toBe(true);
  });

  it("recognizes provider names", () => {
    expect(isProviderName("runway")).toBe(true);
    expect(isProviderName("hasOwnProperty")).toBe(false);
  });
});
