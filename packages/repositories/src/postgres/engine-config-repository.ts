/**
 * Postgres Engine Config Repository
 */

import { desc, eq } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";

import { engineConfig, type DbClient } from "@dnmm/db";

import { configReasonSchema, decodeEngineConfig, encodeEngineConfig } from "../codec/engine-codec";
import type { EngineConfigRecord, EngineConfigRepository } from "../interfaces/engine-config-repository";
import { dbError, type RepositoryError } from "../interfaces/errors";

export function createPostgresEngineConfigRepository(db: DbClient): EngineConfigRepository {
  return {
    async save(record: EngineConfigRecord): Promise<Result<void, RepositoryError>> {
      try {
        await db.insert(engineConfig).values({
          poolId: record.poolId,
          ts: record.ts,
          reason: record.reason,
          config: encodeEngineConfig(record.config),
        });
        return ok(undefined);
      } catch (error) {
        return err(dbError(error));
      }
    },

    async getLatest(poolId: string): Promise<Result<EngineConfigRecord | null, RepositoryError>> {
      try {
        const rows = await db
          .select()
          .from(engineConfig)
          .where(eq(engineConfig.poolId, poolId))
          .orderBy(desc(engineConfig.ts))
          .limit(1);

        const row = rows[0];
        if (row === undefined) return ok(null);

        const reason = configReasonSchema.safeParse(row.reason);
        if (!reason.success) {
          return err({ type: "CODEC_ERROR", message: `Unknown config reason: ${row.reason}` });
        }
        const decoded = decodeEngineConfig(row.config);
        if (decoded.isErr()) return err(decoded.error);
        return ok({ poolId: row.poolId, ts: row.ts, reason: reason.data, config: decoded.value });
      } catch (error) {
        return err(dbError(error));
      }
    },
  };
}
