/**
 * Engine Config Repository Interface
 *
 * Append-only history of accepted parameter sets.
 */

import type { Result } from "neverthrow";

import type { ConfigUpdate, EngineConfig } from "@dnmm/core";

import type { RepositoryError } from "./errors";

export interface EngineConfigRecord {
  poolId: string;
  ts: Date;
  reason: ConfigUpdate["kind"] | "initial";
  config: EngineConfig;
}

export interface EngineConfigRepository {
  save: (record: EngineConfigRecord) => Promise<Result<void, RepositoryError>>;
  getLatest: (poolId: string) => Promise<Result<EngineConfigRecord | null, RepositoryError>>;
}
