/**
 * Config Restore
 *
 * The latest recorded config wins over the parameter file, which only seeds
 * the first run. A restored config passes the same gate as a governance
 * update before the engine may use it.
 */

import { err, ok, type Result } from "neverthrow";

import { validateEngineConfig, type ConfigError, type EngineConfig } from "@dnmm/core";
import type { EngineConfigRepository, RepositoryError } from "@dnmm/repositories";
import { logger } from "@dnmm/utils";

export type ConfigRestoreError = RepositoryError | ConfigError;

export interface RestoredConfig {
  config: EngineConfig;
  restored: boolean;
}

export async function restoreEngineConfig(
  repository: EngineConfigRepository,
  poolId: string,
  seed: EngineConfig,
  now: Date = new Date(),
): Promise<Result<RestoredConfig, ConfigRestoreError>> {
  const latest = await repository.getLatest(poolId);
  if (latest.isErr()) return err(latest.error);

  if (latest.value === null) {
    const saved = await repository.save({ poolId, ts: now, reason: "initial", config: seed });
    if (saved.isErr()) logger.warn("Failed to record initial config", { error: saved.error });
    return ok({ config: seed, restored: false });
  }

  const validated = validateEngineConfig(latest.value.config);
  if (validated.isErr()) {
    logger.error("Stored engine config is invalid", { poolId, reason: latest.value.reason, error: validated.error });
    return err(validated.error);
  }

  logger.info("Restored engine config", { reason: latest.value.reason });
  return ok({ config: validated.value, restored: true });
}
