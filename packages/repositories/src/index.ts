/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Postgres (drizzle) and in-memory implementations
 * - zod codec for bigint-bearing engine values
 */

export * from "./codec/engine-codec";
export * from "./interfaces";
export * from "./memory";
export * from "./postgres";
