/**
 * In-memory JobStore. Default driver and test double.
 */

import {
  applyJobPatch,
  assertJobPatchAllowed,
  initialJob,
  type GenerationJob,
  type JobPatch,
  type JobQuery,
  type JobStore,
  type NewJob,
} from "./types.js";

export function matchesJobQuery(job: GenerationJob, query: JobQuery = {}): boolean {
  if (query.provider != null && job.provider !== query.provider) return false;
  if (query.status != null && job.status !== query.status) return false;
  return true;
}

function copy(job: GenerationJob): GenerationJob {
  return { ...job, parameters: { ...job.parameters } };
}

export class InMemoryJobStore implements JobStore {
  private readonly rows = new Map<string, GenerationJob>();
  /** Insertion order breaks createdAt ties. */
  private readonly order = new Map<string, number>();
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(id: string): Promise<GenerationJob | undefined> {
    const row = this.rows.get(id);
    return row ? copy(row) : undefined;
  }

  async create(input: NewJob): Promise<GenerationJob> {
    if (this.rows.has(input.id)) {
      throw new Error(`Job ${input.id} already exists`);
    }
    const row = initialJob({ ...input, parameters: { ...input.parameters } }, this.now().toISOString());
    this.rows.set(row.id, row);
    this.order.set(row.id, this.seq++);
    return copy(row);
  }

  async update(id: string, patch: JobPatch): Promise<GenerationJob | undefined> {
    const row = this.rows.get(id);
    if (!row) return undefined;
    assertJobPatchAllowed(row, patch);
    const next = applyJobPatch(row, patch, this.now().toISOString());
    this.rows.set(id, next);
    return copy(next);
  }

  async list(query: JobQuery = {}): Promise<GenerationJob[]> {
    const skip = Math.max(0, query.skip ?? 0);
    const matching = [...this.rows.values()]
      .filter((j) => matchesJobQuery(j, query))
      .sort((a, b) => {
        const byTime = b.createdAt.localeCompare(a.createdAt);
        return byTime !== 0 ? byTime : (this.order.get(b.id) ?? 0) - (this.order.get(a.id) ?? 0);
      });
    const page = query.limit != null ? matching.slice(skip, skip + query.limit) : matching.slice(skip);
    return page.map(copy);
  }

  async delete(id: string): Promise<boolean> {
    this.order.delete(id);
    return this.rows.delete(id);
  }
}
