/**
 * Postgres Engine Event Repository
 */

import { and, desc, eq } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";

import { engineEvent, type DbClient } from "@dnmm/db";

import { decodeEngineEvent, encodeEngineEvent } from "../codec/engine-codec";
import type { EngineEventQuery, EngineEventRecord, EngineEventRepository } from "../interfaces/engine-event-repository";
import { dbError, type RepositoryError } from "../interfaces/errors";

export function createPostgresEngineEventRepository(db: DbClient): EngineEventRepository {
  return {
    async append(records: EngineEventRecord[]): Promise<Result<void, RepositoryError>> {
      if (records.length === 0) return ok(undefined);
      try {
        await db.insert(engineEvent).values(
          records.map((record) => ({
            poolId: record.poolId,
            ts: record.ts,
            type: record.event.type,
            payload: encodeEngineEvent(record.event),
          })),
        );
        return ok(undefined);
      } catch (error) {
        return err(dbError(error));
      }
    },

    async listRecent(query: EngineEventQuery): Promise<Result<EngineEventRecord[], RepositoryError>> {
      try {
        const rows = await db
          .select()
          .from(engineEvent)
          .where(
            and(
              eq(engineEvent.poolId, query.poolId),
              query.type === undefined ? undefined : eq(engineEvent.type, query.type),
            ),
          )
          .orderBy(desc(engineEvent.ts))
          .limit(query.limit);

        const records: EngineEventRecord[] = [];
        for (const row of rows) {
          const decoded = decodeEngineEvent(row.payload);
          if (decoded.isErr()) return err(decoded.error);
          records.push({ poolId: row.poolId, ts: row.ts, event: decoded.value });
        }
        return ok(records);
      } catch (error) {
        return err(dbError(error));
      }
    },
  };
}
