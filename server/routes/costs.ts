/**
 * Cost routes - estimate before submitting, and the pricing table.
 */

import type { Request, Response } from "express";
import { err, fail, invalidBody } from "./respond.js";
import { CostEstimateRequestSchema } from "../../src/lib/schemas/api.js";
import { estimateCost, getModelPricing, getPricingInfo } from "../../src/lib/pricing/costEstimator.js";
import { getProviderForModel } from "../../src/lib/providers/index.js";

export async function estimatePost(req: Request, res: Response) {
  try {
    const parsed = CostEstimateRequestSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);
    const body = parsed.data;
    const provider = body.provider ?? getProviderForModel(body.model);
    if (!getModelPricing(provider, body.model)) {
      return err(res, 400, "VALIDATION_ERROR", `Unknown model: ${body.model} for provider ${provider}`);
    }
    const estimate = estimateCost(provider, body.model, body.duration, body.aspectRatio);
    res.json({ success: true, provider, model: body.model, ...estimate });
  } catch (e) {
    fail(res, e);
  }
}

export async function pricingGet(_req: Request, res: Response) {
  try {
    res.json({ success: true, pricing: getPricingInfo() });
  } catch (e) {
    fail(res, e);
  }
}
