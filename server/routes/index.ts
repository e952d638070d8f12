/**
 * API route registration for Express.
 * Mounts all routes under /v1 via a dedicated router.
 */

import express, { type Express } from "express";
import * as generations from "./generations.js";
import * as keys from "./keys.js";
import * as providers from "./providers.js";
import * as costs from "./costs.js";
import * as usage from "./usage.js";

export function registerApiRoutes(app: Express): void {
  const api = express.Router();

  // Generations
  api.post("/video/generations", generations.createGenerationPost);
  api.get("/video/generations", generations.generationsListGet);
  api.get("/video/generations/:id", generations.generationGet);
  api.post("/video/generations/:id/cancel", generations.generationCancelPost);
  api.delete("/video/generations/:id", generations.generationDelete);

  // Keys
  api.post("/keys", keys.addKeyPost);
  api.get("/keys", keys.keysListGet);
  api.delete("/keys/:id", keys.keyDelete);
  api.post("/keys/:id/revoke", keys.keyRevokePost);
  api.post("/keys/:id/validate", keys.keyValidatePost);

  // Providers
  api.get("/providers", providers.providersGet);

  // Costs
  api.post("/costs/estimate", costs.estimatePost);
  api.get("/costs/pricing", costs.pricingGet);

  // Usage
  api.get("/usage/stats", usage.statsGet);

  app.use("/v1", api);
}
