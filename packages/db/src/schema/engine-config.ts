/**
 * engine_config - Applied parameter sets
 *
 * A row is appended for every accepted config update; the latest row per pool
 * is the active configuration.
 */

import { index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const engineConfig = pgTable(
  "engine_config",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    poolId: text("pool_id").notNull(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    /** ConfigUpdate kind that produced this row, or "initial" */
    reason: text("reason").notNull(),
    config: jsonb("config").notNull(),
  },
  table => [index("engine_config_pool_id_ts_idx").on(table.poolId, table.ts.desc())],
);

export type EngineConfigRow = typeof engineConfig.$inferSelect;
export type NewEngineConfigRow = typeof engineConfig.$inferInsert;
