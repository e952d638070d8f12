/**
 * Video generation API routes - create, get, list, cancel, delete.
 */

import type { Request, Response } from "express";
import { getGatewayContext } from "../context.js";
import { err, fail, invalidBody } from "./respond.js";
import { GenerationRequestSchema, ListGenerationsQuerySchema } from "../../src/lib/schemas/api.js";
import { ValidationError } from "../../src/lib/errors.js";
import { getProviderForModel, isProviderName, listProviderNames } from "../../src/lib/providers/index.js";
import { isTerminalStatus, newJobId, toJobView } from "../../src/lib/jobs/index.js";

export async function createGenerationPost(req: Request, res: Response) {
  try {
    const parsed = GenerationRequestSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);
    const body = parsed.data;
    const { vault, jobs, orchestrator, createAdapter } = getGatewayContext();

    const provider = body.provider ?? getProviderForModel(body.model);
    if (!isProviderName(provider)) {
      throw new ValidationError(`Unknown provider: ${provider}. Available: ${listProviderNames().join(", ")}`);
    }
    const credential = await vault.getActiveKeyForProvider(provider);
    if (!credential) {
      return err(res, 400, "NO_ACTIVE_KEY", `No active API key for provider: ${provider}`);
    }
    const secret = vault.decryptKey(credential);
    const adapter = createAdapter(provider, secret);
    if (!adapter.models.includes(body.model)) {
      throw new ValidationError(`Unknown model: ${body.model} for provider ${provider}`, {
        available: adapter.listModels(),
      });
    }

    const job = await jobs.create({
      id: newJobId(),
      provider,
      model: body.model,
      prompt: body.prompt,
      parameters: {
        duration: body.duration,
        aspectRatio: body.aspectRatio,
        seed: body.seed ?? null,
        fps: body.fps ?? null,
      },
    });
    orchestrator.submitAndTrackJob(job, adapter, secret, {
      prompt: body.prompt,
      model: body.model,
      duration: body.duration,
      aspectRatio: body.aspectRatio,
      seed: body.seed,
      fps: body.fps,
      resolution: body.resolution,
    });
    console.log(`[Jobs] Created ${job.id} (${provider}/${body.model})`);
    res.status(201).json({ success: true, generation: toJobView(job) });
  } catch (e) {
    fail(res, e);
  }
}

export async function generationGet(req: Request, res: Response) {
  try {
    const job = await getGatewayContext().jobs.get(String(req.params.id));
    if (!job) return err(res, 404, "NOT_FOUND", "Generation not found");
    res.json({ success: true, generation: toJobView(job) });
  } catch (e) {
    fail(res, e);
  }
}

export async function generationsListGet(req: Request, res: Response) {
  try {
    const parsed = ListGenerationsQuerySchema.safeParse(req.query);
    if (!parsed.success) return invalidBody(res, parsed.error, "Invalid query parameters");
    const query = parsed.data;
    const jobs = await getGatewayContext().jobs.list(query);
    res.json({
      success: true,
      generations: jobs.map(toJobView),
      skip: query.skip,
      limit: query.limit,
    });
  } catch (e) {
    fail(res, e);
  }
}

/** Marks a running job CANCELLED and stops its polling. */
export async function generationCancelPost(req: Request, res: Response) {
  try {
    const id = String(req.params.id);
    const { jobs, orchestrator } = getGatewayContext();
    const job = await jobs.get(id);
    if (!job) return err(res, 404, "NOT_FOUND", "Generation not found");
    if (isTerminalStatus(job.status)) {
      return err(res, 409, "ALREADY_FINISHED", `Generation is already ${job.status}`);
    }
    orchestrator.cancel(id);
    const updated = await jobs.update(id, { status: "cancelled" });
    if (!updated) return err(res, 404, "NOT_FOUND", "Generation not found");
    res.json({ success: true, generation: toJobView(updated) });
  } catch (e) {
    fail(res, e);
  }
}

/** Deletes the record and its stored artifact. */
export async function generationDelete(req: Request, res: Response) {
  try {
    const id = String(req.params.id);
    const { jobs, artifacts, orchestrator } = getGatewayContext();
    const job = await jobs.get(id);
    if (!job) return err(res, 404, "NOT_FOUND", "Generation not found");
    orchestrator.cancel(id);
    if (job.videoPath) {
      await artifacts.delete(job.videoPath);
    }
    await jobs.delete(id);
    res.json({ success: true, id, deleted: true });
  } catch (e) {
    fail(res, e);
  }
}
