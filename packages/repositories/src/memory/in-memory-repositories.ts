/**
 * In-Memory Repositories
 *
 * Used by the mirror when no DATABASE_URL is configured, and by tests.
 * Records are stored through the codec so reads return fresh copies.
 * State and config keep only the latest row per pool; events are capped.
 */

import { err, ok, type Result } from "neverthrow";

import type { JsonValue } from "@dnmm/utils";

import {
  decodeEngineConfig,
  decodeEngineEvent,
  decodePoolState,
  encodeEngineConfig,
  encodeEngineEvent,
  encodePoolState,
} from "../codec/engine-codec";
import type { EngineConfigRecord, EngineConfigRepository } from "../interfaces/engine-config-repository";
import type { EngineEventRecord, EngineEventRepository } from "../interfaces/engine-event-repository";
import type { RepositoryError } from "../interfaces/errors";
import type { PoolStateRecord, PoolStateRepository } from "../interfaces/pool-state-repository";

interface Stored<T> {
  meta: T;
  json: JsonValue;
}

/** Keeps the latest row per pool; an older ts never replaces a newer one */
function keepLatest<T extends { poolId: string; ts: Date }>(rows: Map<string, Stored<T>>, row: Stored<T>): void {
  const current = rows.get(row.meta.poolId);
  if (current === undefined || row.meta.ts.getTime() >= current.meta.ts.getTime()) {
    rows.set(row.meta.poolId, row);
  }
}

export function createInMemoryPoolStateRepository(): PoolStateRepository {
  const rows = new Map<string, Stored<Omit<PoolStateRecord, "state">>>();

  return {
    save(record: PoolStateRecord): Promise<Result<void, RepositoryError>> {
      const { state, ...meta } = record;
      keepLatest(rows, { meta, json: encodePoolState(state) });
      return Promise.resolve(ok(undefined));
    },

    getLatest(poolId: string): Promise<Result<PoolStateRecord | null, RepositoryError>> {
      const row = rows.get(poolId);
      if (row === undefined) return Promise.resolve(ok(null));
      const decoded = decodePoolState(row.json);
      if (decoded.isErr()) return Promise.resolve(err(decoded.error));
      return Promise.resolve(ok({ ...row.meta, state: decoded.value }));
    },
  };
}

/**
 * Keeps the newest `historyLimit` events across all pools.
 */
export function createInMemoryEngineEventRepository(historyLimit = 1_000): EngineEventRepository {
  let rows: Stored<Omit<EngineEventRecord, "event">>[] = [];

  return {
    append(records: EngineEventRecord[]): Promise<Result<void, RepositoryError>> {
      for (const { event, ...meta } of records) {
        rows.push({ meta, json: encodeEngineEvent(event) });
      }
      if (rows.length > historyLimit) {
        rows = rows.slice(rows.length - historyLimit);
      }
      return Promise.resolve(ok(undefined));
    },

    listRecent(query): Promise<Result<EngineEventRecord[], RepositoryError>> {
      const records: EngineEventRecord[] = [];
      for (let i = rows.length - 1; i >= 0 && records.length < query.limit; i--) {
        const row = rows[i];
        if (row === undefined || row.meta.poolId !== query.poolId) continue;
        const decoded = decodeEngineEvent(row.json);
        if (decoded.isErr()) return Promise.resolve(err(decoded.error));
        if (query.type !== undefined && decoded.value.type !== query.type) continue;
        records.push({ ...row.meta, event: decoded.value });
      }
      return Promise.resolve(ok(records));
    },
  };
}

export function createInMemoryEngineConfigRepository(): EngineConfigRepository {
  const rows = new Map<string, Stored<Omit<EngineConfigRecord, "config">>>();

  return {
    save(record: EngineConfigRecord): Promise<Result<void, RepositoryError>> {
      const { config, ...meta } = record;
      keepLatest(rows, { meta, json: encodeEngineConfig(config) });
      return Promise.resolve(ok(undefined));
    },

    getLatest(poolId: string): Promise<Result<EngineConfigRecord | null, RepositoryError>> {
      const row = rows.get(poolId);
      if (row === undefined) return Promise.resolve(ok(null));
      const decoded = decodeEngineConfig(row.json);
      if (decoded.isErr()) return Promise.resolve(err(decoded.error));
      return Promise.resolve(ok({ ...row.meta, config: decoded.value }));
    },
  };
}
