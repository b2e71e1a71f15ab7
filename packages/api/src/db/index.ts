import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "./schema/index.js";

// A single Postgres.js client per process; Postgres.js manages pooling internally.
export function createDb(databaseUrl: string, opts?: { poolSize?: number }) {
  const sql = postgres(databaseUrl, {
    max: opts?.poolSize ?? 10,
    connect_timeout: 5,
  });
  const db = drizzle(sql, { schema });
  return { sql, db };
}

export type Db = ReturnType<typeof createDb>["db"];
