/**
 * Applies drizzle/*.sql in filename order, each in its own transaction.
 * Usage: DATABASE_URL=postgresql://... tsx scripts/db/migrate.ts [--status]
 */

import { readFile, readdir } from "fs/promises";
import { join } from "path";
import pg from "pg";

const MIGRATIONS_DIR = process.env.MIGRATIONS_DIR ?? join(process.cwd(), "drizzle");

async function appliedMigrations(client: pg.Client): Promise<Set<string>> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS "_migrations" (
      "name" text PRIMARY KEY,
      "applied_at" timestamp with time zone NOT NULL DEFAULT now()
    )
  `);
  const { rows } = await client.query<{ name: string }>("SELECT name FROM _migrations");
  return new Set(rows.map((r) => r.name));
}

async function apply(client: pg.Client, file: string): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, file), "utf-8");
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
    await client.query("COMMIT");
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  }
}

async function main() {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error("DATABASE_URL is required");
  }
  const statusOnly = process.argv.includes("--status");
  const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();

  const client = new pg.Client({ connectionString: url });
  await client.connect();
  try {
    const applied = await appliedMigrations(client);
    const pending = files.filter((f) => !applied.has(f));
    if (statusOnly) {
      for (const f of files) console.log(`[Migrate] ${applied.has(f) ? "applied" : "pending"}  ${f}`);
      return;
    }
    if (pending.length === 0) {
      console.log("[Migrate] Nothing to apply.");
      return;
    }
    for (const f of pending) {
      await apply(client, f);
      console.log(`[Migrate] Applied ${f}`);
    }
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error("[Migrate] Failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
