/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Every table is keyed by pool_id with a timestamptz(UTC) `ts` column
 * - bigint amounts live inside jsonb as decimal strings
 */

// Engine state (recovery)
export * from "./pool-state-snapshot";

// Append-only logs
export * from "./engine-event";
export * from "./engine-config";
