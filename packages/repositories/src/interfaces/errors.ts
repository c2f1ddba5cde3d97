import type { CodecError } from "../codec/engine-codec";

/**
 * Repository error types
 */
export type RepositoryError = { type: "DB_ERROR"; message: string } | CodecError;

export function dbError(error: unknown): RepositoryError {
  return { type: "DB_ERROR", message: error instanceof Error ? error.message : "Unknown error" };
}
