/**
 * Request bodies and query strings for the public API.
 */

import { z } from "zod";

export const ASPECT_RATIO_PATTERN = /^\d+:\d+$/;
export const RESOLUTION_PATTERN = /^\d+x\d+$/;

export const MIN_DURATION_SECONDS = 1;
export const MAX_DURATION_SECONDS = 10;
export const DEFAULT_DURATION_SECONDS = 5;
export const DEFAULT_ASPECT_RATIO = "16:9";

const Duration = z
  .number()
  .int("duration must be a whole number of seconds")
  .min(MIN_DURATION_SECONDS, `duration must be between ${MIN_DURATION_SECONDS} and ${MAX_DURATION_SECONDS} seconds`)
  .max(MAX_DURATION_SECONDS, `duration must be between ${MIN_DURATION_SECONDS} and ${MAX_DURATION_SECONDS} seconds`);

const AspectRatio = z.string().regex(ASPECT_RATIO_PATTERN, 'aspectRatio must look like "16:9"');

export const GenerationRequestSchema = z.object({
  model: z.string().min(1),
  prompt: z.string().trim().min(1).max(4000),
  provider: z.string().min(1).optional(),
  duration: Duration.default(DEFAULT_DURATION_SECONDS),
  aspectRatio: AspectRatio.default(DEFAULT_ASPECT_RATIO),
  seed: z.number().int().nonnegative().optional(),
  fps: z.number().int().positive().max(120).optional(),
  resolution: z.string().regex(RESOLUTION_PATTERN, 'resolution must look like "1280x720"').optional(),
});
export type GenerationRequestBody = z.infer<typeof GenerationRequestSchema>;

export const ListGenerationsQuerySchema = z.object({
  skip: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  provider: z.string().min(1).optional(),
  status: z.enum(["queued", "processing", "completed", "failed", "cancelled"]).optional(),
});
export type ListGenerationsQuery = z.infer<typeof ListGenerationsQuerySchema>;

export const AddKeyRequestSchema = z.object({
  provider: z.string().min(1),
  apiKey: z.string().min(1),
});
export type AddKeyRequestBody = z.infer<typeof AddKeyRequestSchema>;

export const CostEstimateRequestSchema = z.object({
  model: z.string().min(1),
  provider: z.string().min(1).optional(),
  duration: Duration.default(DEFAULT_DURATION_SECONDS),
  aspectRatio: AspectRatio.default(DEFAULT_ASPECT_RATIO),
});
export type CostEstimateRequestBody = z.infer<typeof CostEstimateRequestSchema>;

export const IdParamSchema = z.coerce.number().int().positive();

/** Issues flattened for the error envelope. */
export function issueDetails(error: z.ZodError): Array<{ path: (string | number)[]; message: string }> {
  return error.issues.map((i) => ({ path: i.path, message: i.message }));
}
