/**
 * Provider discovery: models, capabilities and key status.
 */

import type { Request, Response } from "express";
import { getGatewayContext } from "../context.js";
import { fail } from "./respond.js";
import { listProviderInfo } from "../../src/lib/providers/index.js";

export async function providersGet(_req: Request, res: Response) {
  try {
    const keys = await getGatewayContext().vault.listKeys();
    const providers = listProviderInfo().map((info) => {
      const own = keys.filter((k) => k.provider === info.name);
      const active = own.find((k) => k.status === "active");
      return {
        ...info,
        hasKey: own.length > 0,
        keyStatus: active ? active.status : (own[0]?.status ?? null),
      };
    });
    res.json({ success: true, providers });
  } catch (e) {
    fail(res, e);
  }
}
