/**
 * pool_state_snapshot - Engine state snapshots (recovery)
 *
 * - Written by the mirror's persist worker and after every committed write
 * - `state` holds the full PoolState with bigints encoded as decimal strings
 * - `version` increases by one per committed write
 */

import { bigint, index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const poolStateSnapshot = pgTable(
  "pool_state_snapshot",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    poolId: text("pool_id").notNull(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    version: bigint("version", { mode: "number" }).notNull(),
    state: jsonb("state").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [index("pool_state_snapshot_pool_id_ts_idx").on(table.poolId, table.ts.desc())],
);

export type PoolStateSnapshot = typeof poolStateSnapshot.$inferSelect;
export type NewPoolStateSnapshot = typeof poolStateSnapshot.$inferInsert;
