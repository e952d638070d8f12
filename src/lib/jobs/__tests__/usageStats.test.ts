import { describe, it, expect } from "vitest";
import { computeUsageStats, getUsageStats } from "../usageStats.js";
import { InMemoryJobStore } from "../memoryJobStore.js";
import { initialJob, type GenerationJob } from "../types.js";

function job(id: string, provider: string, model: string, patch: Partial<GenerationJob> = {}): GenerationJob {
  return {
    ...initialJob(
      { id, provider, model, prompt: "p", parameters: { duration: 5, aspectRatio: "16:9" } },
      "2026-02-01T00:00:00.000Z"
    ),
    ...patch,
  };
}

describe("computeUsageStats", () => {
  it("aggregates totals, success rate and buckets", () => {
    const stats = computeUsageStats([
      job("gen_4", "openai", "sora-2", { status: "processing" }),
      job("gen_3", "runway", "runway-gen3", { status: "failed" }),
      job("gen_2", "openai", "sora-2", {
        status: "completed",
        cost: 0.5,
        durationSeconds: 5,
        generationTimeSeconds: 40,
      }),
      job("gen_1", "kling", "kling-1.5", {
        status: "completed",
        cost: 0.2,
        durationSeconds: 5,
        generationTimeSeconds: 20,
      }),
    ]);

    expect(stats).toMatchObject({
      totalGenerations: 4,
      completed: 2,
      failed: 1,
      inProgress: 1,
      // in-progress jobs count against the rate
      successRate: 0.5,
      totalCost: 0.7,
      totalVideoSeconds: 10,
      averageGenerationTimeSeconds: 30,
    });
    expect(stats.byProvider).toEqual({
      openai: { count: 2, completed: 1, failed: 0, totalCost: 0.5 },
      runway: { count: 1, completed: 0, failed: 1, totalCost: 0 },
      kling: { count: 1, completed: 1, failed: 0, totalCost: 0.2 },
    });
    expect(stats.byModel["sora-2"]).toEqual({ count: 2, completed: 1, failed: 0, totalCost: 0.5 });
    expect(stats.recent.map((v) => v.id)).toEqual(["gen_4", "gen_3", "gen_2", "gen_1"]);
  });

  it("reports zeros for an empty store", async () => {
    const stats = await getUsageStats(new InMemoryJobStore());
    expect(stats).toEqual({
      totalGenerations: 0,
      completed: 0,
      failed: 0,
      inProgress: 0,
      successRate: 0,
      totalCost: 0,
      totalVideoSeconds: 0,
      averageGenerationTimeSeconds: null,
      byProvider: {},
      byModel: {},
      recent: [],
    });
  });

  it("keeps only the ten most recent jobs", () => {
    const jobs = Array.from({ length: 12 }, (_, i) => job(`gen_${12 - i}`, "openai", "sora-2"));
    expect(computeUsageStats(jobs).recent.map((v) => v.id)).toEqual(
      ["gen_12", "gen_11", "gen_10", "gen_9", "gen_8", "gen_7", "gen_6", "gen_5", "gen_4", "gen_3"]
    );
  });
});
