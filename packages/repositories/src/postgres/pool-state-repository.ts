/**
 * Postgres Pool State Repository
 */

import { desc, eq } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";

import { poolStateSnapshot, type DbClient } from "@dnmm/db";

import { decodePoolState, encodePoolState } from "../codec/engine-codec";
import { dbError, type RepositoryError } from "../interfaces/errors";
import type { PoolStateRecord, PoolStateRepository } from "../interfaces/pool-state-repository";

export function createPostgresPoolStateRepository(db: DbClient): PoolStateRepository {
  return {
    async save(record: PoolStateRecord): Promise<Result<void, RepositoryError>> {
      try {
        await db.insert(poolStateSnapshot).values({
          poolId: record.poolId,
          ts: record.ts,
          version: record.version,
          state: encodePoolState(record.state),
        });
        return ok(undefined);
      } catch (error) {
        return err(dbError(error));
      }
    },

    async getLatest(poolId: string): Promise<Result<PoolStateRecord | null, RepositoryError>> {
      try {
        const rows = await db
          .select()
          .from(poolStateSnapshot)
          .where(eq(poolStateSnapshot.poolId, poolId))
          .orderBy(desc(poolStateSnapshot.ts), desc(poolStateSnapshot.version))
          .limit(1);

        const row = rows[0];
        if (row === undefined) return ok(null);

        const decoded = decodePoolState(row.state);
        if (decoded.isErr()) return err(decoded.error);
        return ok({ poolId: row.poolId, ts: row.ts, version: row.version, state: decoded.value });
      } catch (error) {
        return err(dbError(error));
      }
    },
  };
}
