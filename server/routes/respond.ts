/**
 * Error envelope shared by the route modules.
 */

import type { Response } from "express";
import type { ZodError } from "zod";
import { ValidationError, errorMessage } from "../../src/lib/errors.js";
import { issueDetails } from "../../src/lib/schemas/api.js";
import { JobStateError } from "../../src/lib/jobs/types.js";

export function err(res: Response, status: number, code: string, message: string, details?: unknown) {
  res.status(status).json({ success: false, error: { code, message, details } });
}

export function invalidBody(res: Response, error: ZodError, message = "Invalid request body") {
  err(res, 400, "VALIDATION_ERROR", message, issueDetails(error));
}

/** ValidationError → 400, JobStateError → 409, anything else → 500. */
export function fail(res: Response, e: unknown) {
  if (e instanceof ValidationError) {
    return err(res, 400, e.code, e.message, e.details);
  }
  if (e instanceof JobStateError) {
    return err(res, 409, "ALREADY_FINISHED", e.message);
  }
  console.error("[Server] Request failed:", errorMessage(e));
  err(res, 500, "INTERNAL_ERROR", e instanceof Error ? e.message : "Internal server error");
}
