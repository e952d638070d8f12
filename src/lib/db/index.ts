/**
 * PostgreSQL access for PERSISTENCE_DRIVER=db. The pool is created on first
 * use from DATABASE_URL and shared by both stores.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { getDbPoolMax } from "../config.js";
import * as schema from "./schema.js";

export type Db = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: Db | null = null;

export function getDb(): Db {
  if (db) return db;
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error("DATABASE_URL is required when PERSISTENCE_DRIVER=db");
  }
  pool = new pg.Pool({ connectionString: url, max: getDbPoolMax() });
  pool.on("error", (e) => {
    console.error("[Db] Idle client error:", e.message);
  });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  const p = pool;
  pool = null;
  db = null;
  if (p) await p.end();
}
