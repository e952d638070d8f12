/**
 * Usage statistics over stored generations.
 */

import type { Request, Response } from "express";
import { getGatewayContext } from "../context.js";
import { fail } from "./respond.js";
import { getUsageStats } from "../../src/lib/jobs/index.js";

export async function statsGet(_req: Request, res: Response) {
  try {
    const stats = await getUsageStats(getGatewayContext().jobs);
    res.json({ success: true, stats });
  } catch (e) {
    fail(res, e);
  }
}
