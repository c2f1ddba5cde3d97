/**
 * packages/db - DB connection helper
 *
 * Builds the `pg` Pool and the drizzle instance with the schema attached.
 * Callers own the pool: close it with `db.$client.end()`.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

/** Query surface the repositories need */
export type DbClient = NodePgDatabase<typeof schema>;

export type Db = DbClient & { $client: Pool };

export function getDb(connectionString: string): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}
