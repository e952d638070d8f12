/**
 * Cost model for video generations: static per-second pricing scaled by output resolution.
 * Pure functions; unknown (provider, model) pairs cost 0.
 */

export interface ModelPricing {
  perSecond: number;
  baseCost: number;
}

export type PricingTable = Readonly<Record<string, Readonly<Record<string, Readonly<ModelPricing>>>>>;

/** USD. Runway and Kling bill in credits; rates are approximations. */
export const PRICING: PricingTable = Object.freeze({
  openai: Object.freeze({
    "sora-2": Object.freeze({ perSecond: 0.1, baseCost: 0 }),
    "sora-1": Object.freeze({ perSecond: 0.1, baseCost: 0 }),
  }),
  runway: Object.freeze({
    "runway-gen3": Object.freeze({ perSecond: 0.05, baseCost: 0 }),
    "runway-gen4": Object.freeze({ perSecond: 0.075, baseCost: 0 }),
  }),
  kling: Object.freeze({
    "kling-1.5": Object.freeze({ perSecond: 0.04, baseCost: 0 }),
    "kling-1.0": Object.freeze({ perSecond: 0.03, baseCost: 0 }),
  }),
});

/** 1280x720 */
export const BASE_PIXELS = 1280 * 720;
export const MIN_RESOLUTION_MULTIPLIER = 0.5;
export const MAX_RESOLUTION_MULTIPLIER = 2.0;

export const ASPECT_RATIO_RESOLUTIONS: Readonly<Record<string, string>> = Object.freeze({
  "16:9": "1280x720",
  "9:16": "720x1280",
  "1:1": "1024x1024",
});
export const DEFAULT_RESOLUTION = "1280x720";

export interface CostBreakdown {
  base: number;
  durationCost: number;
}

export interface CostEstimate {
  estimatedCost: number;
  perSecondRate: number;
  duration: number;
  resolution: string;
  breakdown: CostBreakdown;
}

export function getModelPricing(provider: string, model: string): ModelPricing | undefined {
  const byModel = Object.hasOwn(PRICING, provider) ? PRICING[provider] : undefined;
  if (!byModel || !Object.hasOwn(byModel, model)) return undefined;
  return byModel[model];
}

/** Parses "WIDTHxHEIGHT". Returns undefined for anything else. */
export function parseResolution(resolution: string): { width: number; height: number } | undefined {
  const m = /^\s*(\d+)\s*x\s*(\d+)\s*$/.exec(resolution);
  if (!m) return undefined;
  return { width: parseInt(m[1], 10), height: parseInt(m[2], 10) };
}

/**
 * Pixel count relative to 1280x720, clamped to [0.5, 2.0].
 * Malformed resolutions cost like the base resolution.
 */
export function getResolutionMultiplier(resolution: string | undefined): number {
  if (!resolution) return 1;
  const parsed = parseResolution(resolution);
  if (!parsed) return 1;
  const multiplier = (parsed.width * parsed.height) / BASE_PIXELS;
  return Math.max(MIN_RESOLUTION_MULTIPLIER, Math.min(multiplier, MAX_RESOLUTION_MULTIPLIER));
}

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

/**
 * Formula: (baseCost + perSecond * duration) * resolutionMultiplier, rounded to 4 decimals.
 * The multiplier only applies when a resolution is given.
 */
export function calculateCost(
  provider: string,
  model: string,
  durationSeconds: number,
  resolution?: string
): number {
  const pricing = getModelPricing(provider, model);
  if (!pricing) return 0;
  let total = pricing.baseCost + pricing.perSecond * durationSeconds;
  if (resolution) {
    total *= getResolutionMultiplier(resolution);
  }
  return round4(total);
}

export function resolutionForAspectRatio(aspectRatio: string | undefined): string {
  if (aspectRatio && Object.hasOwn(ASPECT_RATIO_RESOLUTIONS, aspectRatio)) {
    return ASPECT_RATIO_RESOLUTIONS[aspectRatio];
  }
  return DEFAULT_RESOLUTION;
}

/** Preview before a job exists. No side effects. */
export function estimateCost(
  provider: string,
  model: string,
  durationSeconds: number,
  aspectRatio?: string
): CostEstimate {
  const resolution = resolutionForAspectRatio(aspectRatio);
  const pricing = getModelPricing(provider, model);
  const perSecondRate = pricing?.perSecond ?? 0;
  return {
    estimatedCost: calculateCost(provider, model, durationSeconds, resolution),
    perSecondRate,
    duration: durationSeconds,
    resolution,
    breakdown: {
      base: pricing?.baseCost ?? 0,
      durationCost: perSecondRate * durationSeconds,
    },
  };
}

export function getPricingInfo(): PricingTable {
  return PRICING;
}
