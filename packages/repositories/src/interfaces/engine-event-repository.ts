/**
 * Engine Event Repository Interface
 */

import type { Result } from "neverthrow";

import type { EngineEvent, EngineEventType } from "@dnmm/core";

import type { RepositoryError } from "./errors";

export interface EngineEventRecord {
  poolId: string;
  ts: Date;
  event: EngineEvent;
}

export interface EngineEventQuery {
  poolId: string;
  type?: EngineEventType;
  limit: number;
}

export interface EngineEventRepository {
  append: (records: EngineEventRecord[]) => Promise<Result<void, RepositoryError>>;

  /**
   * Newest first
   */
  listRecent: (query: EngineEventQuery) => Promise<Result<EngineEventRecord[], RepositoryError>>;
}
