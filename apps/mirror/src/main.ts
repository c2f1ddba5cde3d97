/**
 * Mirror Main Entry Point
 *
 * - Composition root for the off-chain pool mirror
 * - Restores the latest state and config, or starts from the parameter file
 * - Preview refresh loop and state persistence loop
 * - Graceful shutdown persists the final state
 */

import "dotenv/config";

import { InMemoryEventBus, OracleReader, StaticOracleSource, unixNowSec, type OracleSources } from "@dnmm/adapters";
import { createInitialPoolState, type PoolState, type PoolTokens } from "@dnmm/core";
import { getDb } from "@dnmm/db";
import {
  createInMemoryEngineConfigRepository,
  createInMemoryEngineEventRepository,
  createInMemoryPoolStateRepository,
  createPostgresEngineConfigRepository,
  createPostgresEngineEventRepository,
  createPostgresPoolStateRepository,
  type EngineConfigRepository,
  type EngineEventRepository,
  type PoolStateRepository,
} from "@dnmm/repositories";
import { createIntervalWorker, logger } from "@dnmm/utils";

import { loadParameters, type MirrorParameters, type ReferencePrice } from "./config/parameters";
import { env } from "./env";
import { restoreEngineConfig } from "./services/config-restore";
import { EventRecorder } from "./services/event-recorder";
import { PoolEngine } from "./services/pool-engine";

interface Repositories {
  states: PoolStateRepository;
  events: EngineEventRepository;
  configs: EngineConfigRepository;
  close: () => Promise<void>;
}

function createRepositories(): Repositories {
  if (env.DATABASE_URL === undefined) {
    logger.warn("DATABASE_URL not set; state and events are kept in memory only");
    return {
      states: createInMemoryPoolStateRepository(),
      events: createInMemoryEngineEventRepository(),
      configs: createInMemoryEngineConfigRepository(),
      close: () => Promise.resolve(),
    };
  }

  const db = getDb(env.DATABASE_URL);
  return {
    states: createPostgresPoolStateRepository(db),
    events: createPostgresEngineEventRepository(db),
    configs: createPostgresEngineConfigRepository(db),
    close: () => db.$client.end(),
  };
}

const scaleOf = (decimals: number): bigint => 10n ** BigInt(decimals);

/** Reference prices from the parameter file, re-stamped as fresh on every read */
function createReferenceSources(parameters: MirrorParameters): {
  sources: OracleSources;
  restamp: () => void;
} {
  const stamped: Array<[StaticOracleSource, ReferencePrice]> = [];
  const make = (name: string, price: ReferencePrice): StaticOracleSource => {
    const source = new StaticOracleSource(name, { ...price, publishedAtSec: unixNowSec() });
    stamped.push([source, price]);
    return source;
  };

  const { primary, ema, secondary } = parameters.oracle;
  const sources: OracleSources = {
    primary: make("primary", primary),
    ema: ema === undefined ? undefined : make("ema", ema),
    secondary: secondary === undefined ? undefined : make("secondary", secondary),
  };

  const restamp = (): void => {
    const now = unixNowSec();
    for (const [source, price] of stamped) source.set({ ...price, publishedAtSec: now });
  };
  return { sources, restamp };
}

async function main(): Promise<void> {
  const parametersResult = loadParameters(env.PARAMETERS_PATH);
  if (parametersResult.isErr()) {
    logger.error("Failed to load parameters", { error: parametersResult.error });
    throw new Error(`Invalid parameters: ${parametersResult.error.message}`);
  }
  const parameters = parametersResult.value;
  const { poolId } = parameters;

  logger.info("Starting mirror", { poolId, appEnv: env.APP_ENV, oracleMode: env.ORACLE_MODE });

  const tokens: PoolTokens = {
    base: { decimals: env.BASE_DECIMALS, scale: scaleOf(env.BASE_DECIMALS) },
    quote: { decimals: env.QUOTE_DECIMALS, scale: scaleOf(env.QUOTE_DECIMALS) },
  };

  const repos = createRepositories();

  // Restore state
  const latestState = await repos.states.getLatest(poolId);
  if (latestState.isErr()) {
    throw new Error(`Failed to restore pool state: ${latestState.error.message}`);
  }
  let state: PoolState;
  let version = 0;
  if (latestState.value === null) {
    state = createInitialPoolState({ ...parameters.initial, baseFeeBps: parameters.config.fee.baseBps });
    logger.info("No persisted state; starting from initial reserves");
  } else {
    state = latestState.value.state;
    version = latestState.value.version;
    logger.info("Restored pool state", { version, ts: latestState.value.ts.toISOString() });
  }

  const restoredConfig = await restoreEngineConfig(repos.configs, poolId, parameters.config);
  if (restoredConfig.isErr()) {
    throw new Error(`Failed to restore engine config: ${restoredConfig.error.message}`);
  }
  const { config } = restoredConfig.value;

  const bus = new InMemoryEventBus();
  const engine = new PoolEngine({
    poolId,
    tokens,
    config,
    state,
    version,
    events: new EventRecorder(repos.events, bus),
    configHistory: repos.configs,
  });

  const { sources, restamp } = createReferenceSources(parameters);
  const reader = new OracleReader(sources, {
    timeoutMs: env.ORACLE_TIMEOUT_MS,
    retry: {
      maxAttempts: env.ORACLE_RETRY_ATTEMPTS,
      initialDelayMs: env.ORACLE_BACKOFF_MS,
      maxDelayMs: env.ORACLE_BACKOFF_MS * 10,
      multiplier: 2,
    },
  });

  const previewWorker = createIntervalWorker({
    name: "preview-refresh",
    intervalMs: env.PREVIEW_REFRESH_INTERVAL_MS,
    startupMetadata: { poolId, intervalMs: env.PREVIEW_REFRESH_INTERVAL_MS },
    runOnce: async () => {
      restamp();
      const readings = await reader.read();
      const outcome = await engine.refreshPreviewSnapshot(env.ORACLE_MODE, readings);
      if (outcome.isErr()) {
        logger.warn("Preview refresh rejected", { error: outcome.error });
        return;
      }
      if (outcome.value.refreshed) {
        logger.debug("Preview snapshot refreshed", { ...outcome.value.snapshot });
      }
    },
  });

  let persistedVersion = version;
  const persistState = async (): Promise<void> => {
    const { version: current, state: snapshot } = engine.snapshot();
    if (current === persistedVersion) return;
    const saved = await repos.states.save({ poolId, ts: new Date(), version: current, state: snapshot });
    if (saved.isErr()) {
      logger.error("Failed to persist pool state", { version: current, error: saved.error });
      return;
    }
    persistedVersion = current;
    logger.debug("Pool state persisted", { version: current });
  };

  const persistWorker = createIntervalWorker({
    name: "state-persist",
    intervalMs: env.STATE_PERSIST_INTERVAL_MS,
    startupMetadata: { poolId, intervalMs: env.STATE_PERSIST_INTERVAL_MS },
    runOnce: persistState,
    cleanup: persistState,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    await previewWorker.stop();
    await persistWorker.stop();
    await repos.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error("Mirror failed to start", { error });
  process.exit(1);
});
