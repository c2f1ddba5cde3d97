// Export schema (tables, and the namespace for drizzle(..., { schema }))
export * from "./schema";
export * as schema from "./schema";

// Connection helper (Node-only)
export { getDb } from "./get-db";
export type { Db, DbClient } from "./get-db";
