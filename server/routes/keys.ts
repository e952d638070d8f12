/**
 * Provider API key routes. Plaintext keys come in once and never go back out.
 */

import type { Request, Response } from "express";
import { getGatewayContext } from "../context.js";
import { err, fail, invalidBody } from "./respond.js";
import { AddKeyRequestSchema, IdParamSchema } from "../../src/lib/schemas/api.js";
import { isProviderName, listProviderNames } from "../../src/lib/providers/index.js";

function parseId(req: Request): number | undefined {
  const parsed = IdParamSchema.safeParse(req.params.id);
  return parsed.success ? parsed.data : undefined;
}

export async function addKeyPost(req: Request, res: Response) {
  try {
    const parsed = AddKeyRequestSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);
    const { provider, apiKey } = parsed.data;
    if (!isProviderName(provider)) {
      return err(
        res,
        400,
        "VALIDATION_ERROR",
        `Unknown provider: ${provider}. Available: ${listProviderNames().join(", ")}`
      );
    }
    const { vault, createAdapter } = getGatewayContext();
    const valid = await createAdapter(provider, apiKey).validateKey();
    if (!valid) {
      return err(res, 400, "INVALID_KEY", `API key validation failed for provider: ${provider}`);
    }
    const credential = await vault.addKey(provider, apiKey, new Date());
    console.log(`[Vault] Added key ${credential.id} for ${provider}`);
    res.status(201).json({ success: true, key: vault.toPublicCredential(credential) });
  } catch (e) {
    fail(res, e);
  }
}

export async function keysListGet(_req: Request, res: Response) {
  try {
    const { vault } = getGatewayContext();
    const keys = await vault.listKeys();
    res.json({ success: true, keys: keys.map((k) => vault.toPublicCredential(k)) });
  } catch (e) {
    fail(res, e);
  }
}

export async function keyDelete(req: Request, res: Response) {
  try {
    const id = parseId(req);
    if (id === undefined) return err(res, 400, "VALIDATION_ERROR", "Key id must be a positive integer");
    const deleted = await getGatewayContext().vault.deleteKey(id);
    if (!deleted) return err(res, 404, "NOT_FOUND", "Key not found");
    res.json({ success: true, id, deleted: true });
  } catch (e) {
    fail(res, e);
  }
}

export async function keyRevokePost(req: Request, res: Response) {
  try {
    const id = parseId(req);
    if (id === undefined) return err(res, 400, "VALIDATION_ERROR", "Key id must be a positive integer");
    const { vault } = getGatewayContext();
    if (!(await vault.revokeKey(id))) return err(res, 404, "NOT_FOUND", "Key not found");
    res.json({ success: true, id, status: "revoked" });
  } catch (e) {
    fail(res, e);
  }
}

export async function keyValidatePost(req: Request, res: Response) {
  try {
    const id = parseId(req);
    if (id === undefined) return err(res, 400, "VALIDATION_ERROR", "Key id must be a positive integer");
    const { vault, createAdapter } = getGatewayContext();
    const result = await vault.validateKey(id, createAdapter);
    if (!result) return err(res, 404, "NOT_FOUND", "Key not found");
    res.json({ success: true, id, ...result });
  } catch (e) {
    fail(res, e);
  }
}
