import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";

import * as schema from "./schema/index.js";

export type Schema = typeof schema;

// Services take any Postgres-flavoured Drizzle database so tests can hand in an
// in-process one.
export type Db = PgDatabase<PgQueryResultHKT, Schema>;

export function createDb(opts: { url: string; poolSize: number }) {
  // Postgres.js manages pooling internally.
  const sql = postgres(opts.url, {
    max: opts.poolSize,
    connect_timeout: 5,
  });
  const db: Db = drizzle(sql, { schema });
  return { db, sql };
}
