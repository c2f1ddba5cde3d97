/**
 * Pool State Repository Interface
 *
 * - Snapshot after each committed write and periodically
 * - Read the latest snapshot on startup
 */

import type { Result } from "neverthrow";

import type { PoolState } from "@dnmm/core";

import type { RepositoryError } from "./errors";

export interface PoolStateRecord {
  poolId: string;
  ts: Date;
  /** Committed-write counter of the engine that produced the state */
  version: number;
  state: PoolState;
}

export interface PoolStateRepository {
  save: (record: PoolStateRecord) => Promise<Result<void, RepositoryError>>;

  /**
   * Latest snapshot for a pool, or null when none was written yet
   */
  getLatest: (poolId: string) => Promise<Result<PoolStateRecord | null, RepositoryError>>;
}
