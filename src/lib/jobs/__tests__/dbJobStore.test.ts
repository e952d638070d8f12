import { describe, it, expect, beforeEach, vi } from "vitest";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "../../db/schema.js";
import { DbJobStore, guardedJobUpdate } from "../dbJobStore.js";
import { JobStateError } from "../types.js";

const state = vi.hoisted(() => ({
  selectRows: [] as unknown[],
  updateRows: [] as unknown[],
  updates: 0,
}));

vi.mock("../../db/index.js", () => ({
  getDb: () => ({
    update: () => ({
      set: () => ({
        where: () => ({
          returning: async () => {
            state.updates++;
            return state.updateRows;
          },
        }),
      }),
    }),
    select: () => ({ from: () => ({ where: async () => state.selectRows }) }),
  }),
}));

function row(status: string, providerJobId: string | null = null) {
  const ts = new Date("2026-04-01T00:00:00.000Z");
  return {
    id: "gen_db",
    provider: "openai",
    model: "sora-2",
    prompt: "p",
    parameters: { duration: 5, aspectRatio: "16:9" },
    status,
    providerJobId,
    errorMessage: null,
    videoUrl: null,
    videoPath: null,
    cost: null,
    durationSeconds: null,
    generationTime: null,
    width: null,
    height: null,
    createdAt: ts,
    updatedAt: ts,
    completedAt: null,
  };
}

describe("DbJobStore.update", () => {
  const store = new DbJobStore();

  beforeEach(() => {
    state.selectRows = [];
    state.updateRows = [];
    state.updates = 0;
  });

  it("returns the updated row when the guarded UPDATE matches", async () => {
    state.updateRows = [row("processing")];
    await expect(store.update("gen_db", { status: "processing" })).resolves.toMatchObject({
      id: "gen_db",
      status: "processing",
    });
  });

  it("does not overwrite a job that turned terminal after it was read", async () => {
    // the cancel landed first: the guarded UPDATE matched nothing
    state.updateRows = [];
    state.selectRows = [row("cancelled")];

    await expect(store.update("gen_db", { status: "completed" })).rejects.toThrow(
      new JobStateError("Job gen_db is cancelled and cannot be updated")
    );
    expect(state.updates).toBe(1);
  });

  it("refuses a second provider job id", async () => {
    state.selectRows = [row("processing", "remote-1")];
    await expect(store.update("gen_db", { providerJobId: "remote-2" })).rejects.toThrow(
      "Job gen_db already has provider job id remote-1"
    );
  });

  it("reports a concurrent change that left no readable conflict", async () => {
    state.selectRows = [row("processing")];
    await expect(store.update("gen_db", { status: "failed" })).rejects.toBeInstanceOf(JobStateError);
  });

  it("returns undefined for missing jobs", async () => {
    await expect(store.update("gen_db", { status: "failed" })).resolves.toBeUndefined();
  });
});

describe("guardedJobUpdate", () => {
  // never connects; only used to render SQL
  const db = drizzle(new pg.Pool({ connectionString: "postgres://localhost:5432/unused" }), { schema });

  it("only matches non-terminal rows", () => {
    const query = guardedJobUpdate(db, "gen_db", { status: "completed" }).toSQL();
    expect(query.sql).toMatch(/"status" not in \(\$\d+, \$\d+, \$\d+\)/);
    expect(query.sql).not.toContain("is null");
    expect(query.params).toEqual(expect.arrayContaining(["gen_db", "completed", "failed", "cancelled"]));
  });

  it("only sets a provider job id that is unset or unchanged", () => {
    const query = guardedJobUpdate(db, "gen_db", { providerJobId: "remote-1" }).toSQL();
    expect(query.sql).toMatch(/"provider_job_id" is null or (?:"generations"\.)?"provider_job_id" = \$\d+/);
    expect(query.params).toEqual(expect.arrayContaining(["remote-1"]));
  });
});
