/**
 * Express app - API, stored videos, health.
 */

import express, { type Express } from "express";
import cors from "cors";
import { registerApiRoutes } from "./routes/index.js";
import { getGatewayContext } from "./context.js";
import { getCorsOrigins, getPersistenceDriver, getStoragePath } from "../src/lib/config.js";
import { VIDEOS_ROUTE } from "../src/lib/jobs/index.js";

export function createApp(): Express {
  const app = express();

  app.use(cors({ origin: getCorsOrigins(), credentials: true }));
  app.use(express.json({ limit: "1mb" }));

  registerApiRoutes(app);

  app.use(VIDEOS_ROUTE, express.static(getStoragePath(), { fallthrough: false }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      persistence: getPersistenceDriver(),
      activeJobs: getGatewayContext().orchestrator.activeJobIds().length,
    });
  });

  return app;
}
