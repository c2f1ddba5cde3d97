/**
 * engine_event - Append-only engine event log
 *
 * One row per DIVERGENCE_* / AOMQ_ACTIVATED / RECENTER_COMMITTED /
 * PREVIEW_SNAPSHOT_REFRESHED event.
 */

import { index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const engineEvent = pgTable(
  "engine_event",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    poolId: text("pool_id").notNull(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    type: text("type").notNull(),
    payload: jsonb("payload").notNull(),
  },
  table => [
    index("engine_event_pool_id_ts_idx").on(table.poolId, table.ts.desc()),
    index("engine_event_type_idx").on(table.type),
  ],
);

export type EngineEventRow = typeof engineEvent.$inferSelect;
export type NewEngineEventRow = typeof engineEvent.$inferInsert;
