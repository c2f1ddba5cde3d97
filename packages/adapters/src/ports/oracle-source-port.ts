/**
 * Oracle Source Port - Interface for one price source
 *
 * - Adapters implement this port for a venue or oracle network
 * - The engine only ever sees OracleSample values; transport failures are
 *   folded into `status: "error"` samples by the reader
 */

import type { Result } from "neverthrow";

import type { OracleSample } from "@dnmm/core";

/**
 * Oracle source errors
 */
export type OracleSourceError =
  | { type: "timeout"; message: string }
  | { type: "transport_failed"; message: string }
  | { type: "invalid_response"; message: string };

export interface OracleSourcePort {
  /** Used in logs and error details */
  readonly name: string;

  /**
   * Read the current sample. Implementations should stop work once `signal` aborts.
   */
  read(signal: AbortSignal): Promise<Result<OracleSample, OracleSourceError>>;
}
