import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { once } from "events";
import type { Server } from "http";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { createApp } from "../app.js";
import { setGatewayContext, type GatewayContext } from "../context.js";
import { CredentialVault, EncryptionService, InMemoryCredentialStore } from "../../src/lib/credentials/index.js";
import { FileArtifactStorage, InMemoryJobStore, JobOrchestrator, JobStateError } from "../../src/lib/jobs/index.js";
import { FakeAdapter } from "../../src/lib/providers/__tests__/fakeAdapter.js";
import type { ProviderName } from "../../src/lib/providers/index.js";

/** Walks nested JSON objects; undefined when a step is missing. */
function pick(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (current === null || typeof current !== "object" || !(key in current)) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}

const MODELS: Record<ProviderName, string[]> = {
  openai: ["sora-2", "sora-1"],
  runway: ["runway-gen3", "runway-gen4"],
  kling: ["kling-1.5", "kling-1.0"],
};

describe("gateway HTTP API", () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;
  let ctx: GatewayContext;
  let adapters: FakeAdapter[];
  let keyValid: boolean;

  async function call(method: string, route: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "video-gateway-api-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    adapters = [];
    keyValid = true;
    const jobs = new InMemoryJobStore();
    const artifacts = new FileArtifactStorage(dir);
    ctx = {
      vault: new CredentialVault(new InMemoryCredentialStore(), new EncryptionService("test-master-key")),
      jobs,
      artifacts,
      orchestrator: new JobOrchestrator({
        jobs,
        artifacts,
        publicBaseUrl: "http://localhost:3001",
        maxAttempts: 3,
        sleep: async () => {},
      }),
      createAdapter: (provider, _secret) => {
        const name: ProviderName = provider === "runway" || provider === "kling" ? provider : "openai";
        const adapter = new FakeAdapter(name, MODELS[name]);
        adapter.valid = keyValid;
        adapter.statusOutcomes = [{ jobId: "remote-1", status: "completed", metadata: { width: 1280, height: 720 } }];
        adapters.push(adapter);
        return adapter;
      },
    };
    setGatewayContext(ctx);
    server = createApp().listen(0, "127.0.0.1");
    await once(server, "listening");
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server did not bind a port");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  afterEach(async () => {
    server.close();
    await once(server, "close");
    setGatewayContext(null);
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("keys", () => {
    it("validates, stores and previews a key", async () => {
      const { status, body } = await call("POST", "/v1/keys", {
        provider: "openai",
        apiKey: "sk-test-placeholder-000000001234",
      });
      expect(status).toBe(201);
      expect(body).toMatchObject({
        success: true,
        key: { id: 1, provider: "openai", status: "active", keyPreview: "sk-test-...1234" },
      });
      expect(JSON.stringify(body)).not.toContain("placeholder");

      const list = await call("GET", "/v1/keys");
      expect(list.body).toMatchObject({ success: true, keys: [{ id: 1, provider: "openai" }] });
    });

    it("rejects unknown providers and invalid keys", async () => {
      const unknown = await call("POST", "/v1/keys", { provider: "pika", apiKey: "test-secret" });
      expect(unknown.status).toBe(400);
      expect(unknown.body).toEqual({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Unknown provider: pika. Available: openai, runway, kling" },
      });

      keyValid = false;
      const invalid = await call("POST", "/v1/keys", { provider: "kling", apiKey: "test-secret" });
      expect(invalid.status).toBe(400);
      expect(invalid.body).toMatchObject({ error: { code: "INVALID_KEY" } });
      expect((await ctx.vault.listKeys()).length).toBe(0);
    });

    it("revalidates, revokes and deletes", async () => {
      await ctx.vault.addKey("runway", "test-secret");
      keyValid = false;
      expect((await call("POST", "/v1/keys/1/validate")).body).toEqual({
        success: true,
        id: 1,
        valid: false,
        status: "invalid",
      });
      expect((await call("POST", "/v1/keys/1/revoke")).body).toEqual({ success: true, id: 1, status: "revoked" });
      expect((await call("GET", "/v1/keys")).body).toEqual({ success: true, keys: [] });
      expect((await call("DELETE", "/v1/keys/1")).status).toBe(200);
      expect((await call("DELETE", "/v1/keys/1")).status).toBe(404);
      expect((await call("DELETE", "/v1/keys/abc")).status).toBe(400);
    });
  });

  describe("generations", () => {
    it("creates a job, tracks it, and serves its view", async () => {
      await ctx.vault.addKey("runway", "test-secret");
      const created = await call("POST", "/v1/video/generations", {
        model: "runway-gen3",
        prompt: "a paper boat on a river",
        seed: 3,
      });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        success: true,
        generation: {
          object: "video.generation",
          provider: "runway",
          model: "runway-gen3",
          status: "queued",
          parameters: { duration: 5, aspectRatio: "16:9", seed: 3, fps: null },
          video: null,
        },
      });
      const id = String(pick(created.body, "generation", "id"));
      expect(id).toMatch(/^gen_[0-9a-f]{12}$/);

      await ctx.orchestrator.drain();
      expect(adapters[0].submitted).toEqual([
        {
          prompt: "a paper boat on a river",
          model: "runway-gen3",
          duration: 5,
          aspectRatio: "16:9",
          seed: 3,
          fps: undefined,
          resolution: undefined,
        },
      ]);

      const fetched = await call("GET", `/v1/video/generations/${id}`);
      expect(fetched.body).toMatchObject({
        generation: {
          status: "completed",
          video: { url: null, duration: 5, width: 1280, height: 720 },
          // 0.05 * 5
          usage: { cost: 0.25 },
        },
      });
    });

    it("requires an active key for the provider", async () => {
      const res = await call("POST", "/v1/video/generations", { model: "kling-1.5", prompt: "p" });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        error: { code: "NO_ACTIVE_KEY", message: "No active API key for provider: kling" },
      });
      expect(await ctx.jobs.list()).toEqual([]);
    });

    it("rejects bad bodies and unknown models before creating a job", async () => {
      await ctx.vault.addKey("openai", "test-secret");
      const longVideo = await call("POST", "/v1/video/generations", { model: "sora-2", prompt: "p", duration: 30 });
      expect(longVideo.status).toBe(400);
      expect(pick(longVideo.body, "error", "details")).toEqual([
        { path: ["duration"], message: "duration must be between 1 and 10 seconds" },
      ]);

      const fractional = await call("POST", "/v1/video/generations", { model: "sora-2", prompt: "p", duration: 2.5 });
      expect(fractional.status).toBe(400);
      expect(pick(fractional.body, "error", "details")).toEqual([
        { path: ["duration"], message: "duration must be a whole number of seconds" },
      ]);

      const badRatio = await call("POST", "/v1/video/generations", { model: "sora-2", prompt: "p", aspectRatio: "wide" });
      expect(badRatio.status).toBe(400);

      const unknownModel = await call("POST", "/v1/video/generations", { model: "veo-3", prompt: "p" });
      expect(unknownModel.status).toBe(400);
      expect(pick(unknownModel.body, "error", "message")).toBe("Unknown model: veo-3 for provider openai");
      expect(await ctx.jobs.list()).toEqual([]);
    });

    it("lists, cancels and deletes", async () => {
      const parameters = { duration: 5, aspectRatio: "16:9" };
      await ctx.jobs.create({ id: "gen_aaaaaaaaaaaa", provider: "openai", model: "sora-2", prompt: "p", parameters });
      await ctx.jobs.create({ id: "gen_bbbbbbbbbbbb", provider: "kling", model: "kling-1.5", prompt: "p", parameters });

      const list = await call("GET", "/v1/video/generations?provider=kling&limit=5");
      expect(list.body).toMatchObject({ generations: [{ id: "gen_bbbbbbbbbbbb" }], skip: 0, limit: 5 });
      expect(pick(list.body, "generations")).toHaveLength(1);
      expect((await call("GET", "/v1/video/generations?limit=0")).status).toBe(400);

      const cancelled = await call("POST", "/v1/video/generations/gen_aaaaaaaaaaaa/cancel");
      expect(pick(cancelled.body, "generation", "status")).toBe("cancelled");
      expect((await call("POST", "/v1/video/generations/gen_aaaaaaaaaaaa/cancel")).status).toBe(409);

      expect((await call("DELETE", "/v1/video/generations/gen_aaaaaaaaaaaa")).body).toEqual({
        success: true,
        id: "gen_aaaaaaaaaaaa",
        deleted: true,
      });
      expect((await call("GET", "/v1/video/generations/gen_aaaaaaaaaaaa")).status).toBe(404);
    });

    it("answers 409 when the job settles while a cancel is in flight", async () => {
      const parameters = { duration: 5, aspectRatio: "16:9" };
      await ctx.jobs.create({ id: "gen_cccccccccccc", provider: "openai", model: "sora-2", prompt: "p", parameters });
      vi.spyOn(ctx.jobs, "update").mockRejectedValueOnce(
        new JobStateError("Job gen_cccccccccccc is completed and cannot be updated")
      );

      const res = await call("POST", "/v1/video/generations/gen_cccccccccccc/cancel");

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        success: false,
        error: { code: "ALREADY_FINISHED", message: "Job gen_cccccccccccc is completed and cannot be updated" },
      });
    });
  });

  it("estimates costs and exposes pricing", async () => {
    const estimate = await call("POST", "/v1/costs/estimate", { model: "kling-1.5", duration: 10, aspectRatio: "9:16" });
    expect(estimate.body).toEqual({
      success: true,
      provider: "kling",
      model: "kling-1.5",
      estimatedCost: 0.4,
      perSecondRate: 0.04,
      duration: 10,
      resolution: "720x1280",
      breakdown: { base: 0, durationCost: 0.4 },
    });
    expect((await call("POST", "/v1/costs/estimate", { model: "veo-3" })).status).toBe(400);
    expect(pick((await call("GET", "/v1/costs/pricing")).body, "pricing", "openai", "sora-2")).toEqual({
      perSecond: 0.1,
      baseCost: 0,
    });
  });

  it("reports providers with key status", async () => {
    await ctx.vault.addKey("kling", "test-secret");
    const { body } = await call("GET", "/v1/providers");
    expect(body).toMatchObject({
      providers: [
        { name: "openai", hasKey: false, keyStatus: null },
        { name: "runway", hasKey: false, keyStatus: null },
        { name: "kling", displayName: "Kling", hasKey: true, keyStatus: "active", models: ["kling-1.5", "kling-1.0"] },
      ],
    });
  });

  it("reports usage and health", async () => {
    expect(pick((await call("GET", "/v1/usage/stats")).body, "stats", "totalGenerations")).toBe(0);
    expect((await call("GET", "/health")).body).toEqual({ status: "ok", persistence: "memory", activeJobs: 0 });
  });
});
