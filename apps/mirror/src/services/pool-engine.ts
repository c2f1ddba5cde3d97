/**
 * Pool Engine
 *
 * Stateful shell around the pure core:
 * - Writes (swap, preview refresh, rebalance, config update) run one at a time
 *   through a p-limit(1) queue and commit the next state in one assignment
 * - Reads (quote, previews) see the last committed state and never queue
 * - Events from committed writes go to the event port; a publish failure is
 *   logged and does not undo the write
 */

import { err, ok, type Result } from "neverthrow";
import pLimit from "p-limit";

import {
  applyConfigUpdate,
  evaluateRebalance,
  evaluateSwap,
  previewFees,
  previewFeesFresh,
  previewLadder,
  refreshPreviewSnapshot,
  type Amount,
  type ConfigError,
  type ConfigUpdate,
  type EngineConfig,
  type EngineError,
  type EngineEvent,
  type OracleError,
  type OracleMode,
  type OracleReadings,
  type PoolState,
  type PoolTokens,
  type PreviewFeeError,
  type PreviewFees,
  type PreviewLadder,
  type QuoteResult,
  type RefreshOutcome,
  type RebalanceOutput,
  type Sec,
  type SwapOutput,
  type Tick,
} from "@dnmm/core";
import { unixNowSec, type EngineEventPort } from "@dnmm/adapters";
import type { EngineConfigRepository } from "@dnmm/repositories";
import { createLogger, type Logger } from "@dnmm/utils";

export interface SwapRequest {
  amountIn: Amount;
  isBaseIn: boolean;
  mode: OracleMode;
  readings: OracleReadings;
  /** Used for rebates */
  caller?: string;
}

export interface PoolEngineOptions {
  poolId: string;
  tokens: PoolTokens;
  config: EngineConfig;
  state: PoolState;
  events: EngineEventPort;
  /** Accepted config updates are appended here */
  configHistory?: EngineConfigRepository;
  /** Unix seconds */
  clock?: () => Sec;
  /**
   * Fee decay and sigma advance per tick. Defaults to one tick per second.
   */
  tickClock?: () => Tick;
  /** Version of the restored state; 0 for a fresh pool */
  version?: number;
  logger?: Logger;
}

/** Snapshot of the committed state and the write count that produced it */
export interface VersionedState {
  version: number;
  state: PoolState;
}

export class PoolEngine {
  readonly poolId: string;
  readonly tokens: PoolTokens;

  private state: PoolState;
  private config: EngineConfig;
  private version: number;

  private readonly events: EngineEventPort;
  private readonly configHistory: EngineConfigRepository | undefined;
  private readonly clock: () => Sec;
  private readonly tickClock: () => Tick;
  private readonly log: Logger;
  private readonly writeQueue = pLimit(1);

  constructor(options: PoolEngineOptions) {
    this.poolId = options.poolId;
    this.tokens = options.tokens;
    this.state = options.state;
    this.config = options.config;
    this.version = options.version ?? 0;
    this.events = options.events;
    this.configHistory = options.configHistory;
    this.clock = options.clock ?? unixNowSec;
    this.tickClock = options.tickClock ?? this.clock;
    this.log = options.logger ?? createLogger(options.poolId);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────────

  getState(): PoolState {
    return this.state;
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  getVersion(): number {
    return this.version;
  }

  snapshot(): VersionedState {
    return { version: this.version, state: this.state };
  }

  /**
   * Price a swap against the committed state without committing it.
   */
  quote(request: SwapRequest): Result<QuoteResult, EngineError> {
    return this.evaluate(request).map((output) => output.result);
  }

  /** Fees for base-denominated sizes from the cached snapshot */
  previewFees(sizes: readonly Amount[]): Result<PreviewFees, PreviewFeeError> {
    return previewFees(this.state, sizes, this.clock(), this.tickClock(), this.config, this.tokens);
  }

  previewFeesFresh(sizes: readonly Amount[], mode: OracleMode, readings: OracleReadings): Result<PreviewFees, PreviewFeeError> {
    return previewFeesFresh(this.state, readings, mode, sizes, this.clock(), this.tickClock(), this.config, this.tokens);
  }

  previewLadder(s0Base: Amount): Result<PreviewLadder, PreviewFeeError> {
    return previewLadder(this.state, s0Base, this.clock(), this.tickClock(), this.config, this.tokens);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────────

  swap(request: SwapRequest): Promise<Result<QuoteResult, EngineError>> {
    return this.writeQueue(async (): Promise<Result<QuoteResult, EngineError>> => {
      const output = this.evaluate(request);
      if (output.isErr()) {
        if (output.error.type === "ORACLE_DIVERGED") {
          await this.publish([
            { type: "DIVERGENCE_REJECTED", deltaBps: output.error.deltaBps, hardBps: output.error.hardBps },
          ]);
        }
        return err(output.error);
      }

      const { result, nextState, events } = output.value;
      this.commit(nextState);
      this.log.debug("Swap committed", {
        isBaseIn: request.isBaseIn,
        amountIn: result.amountIn,
        amountOut: result.amountOut,
        feeBps: result.feeBpsUsed,
        reason: result.reason,
      });
      await this.publish(events);
      return ok(result);
    });
  }

  refreshPreviewSnapshot(mode: OracleMode, readings: OracleReadings): Promise<Result<RefreshOutcome, OracleError>> {
    return this.writeQueue(async (): Promise<Result<RefreshOutcome, OracleError>> => {
      const outcome = refreshPreviewSnapshot(this.state, readings, mode, this.clock(), this.config);
      if (outcome.isErr()) return err(outcome.error);

      if (outcome.value.refreshed) {
        this.commit(outcome.value.nextState);
        await this.publish(outcome.value.events);
      }
      return ok(outcome.value);
    });
  }

  /**
   * Permissionless recenter of the inventory target to 50/50 value.
   */
  rebalanceTarget(readings: OracleReadings): Promise<Result<RebalanceOutput, EngineError>> {
    return this.writeQueue(async (): Promise<Result<RebalanceOutput, EngineError>> => {
      const output = evaluateRebalance({
        state: this.state,
        config: this.config,
        tokens: this.tokens,
        readings,
        nowSec: this.clock(),
      });
      if (output.isErr()) return err(output.error);

      this.commit(output.value.nextState);
      await this.publish(output.value.events);
      return ok(output.value);
    });
  }

  /**
   * Replace one config struct. A rejected update leaves the config unchanged.
   */
  updateConfig(update: ConfigUpdate): Promise<Result<EngineConfig, ConfigError>> {
    return this.writeQueue(async (): Promise<Result<EngineConfig, ConfigError>> => {
      const next = applyConfigUpdate(this.config, update);
      if (next.isErr()) {
        this.log.warn("Config update rejected", { kind: update.kind, error: next.error });
        return err(next.error);
      }

      this.config = next.value;
      this.log.info("Config updated", { kind: update.kind });
      if (this.configHistory !== undefined) {
        const saved = await this.configHistory.save({
          poolId: this.poolId,
          ts: new Date(this.clock() * 1000),
          reason: update.kind,
          config: next.value,
        });
        if (saved.isErr()) this.log.warn("Failed to record config update", { kind: update.kind, error: saved.error });
      }
      return ok(next.value);
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private evaluate(request: SwapRequest): Result<SwapOutput, EngineError> {
    return evaluateSwap({
      state: this.state,
      config: this.config,
      tokens: this.tokens,
      amountIn: request.amountIn,
      isBaseIn: request.isBaseIn,
      mode: request.mode,
      readings: request.readings,
      nowSec: this.clock(),
      tick: this.tickClock(),
      caller: request.caller,
    });
  }

  private commit(next: PoolState): void {
    this.state = next;
    this.version += 1;
  }

  private async publish(events: EngineEvent[]): Promise<void> {
    if (events.length === 0) return;
    const ts = new Date(this.clock() * 1000);
    const result = await this.events.publish(events.map((event) => ({ poolId: this.poolId, ts, event })));
    if (result.isErr()) {
      this.log.warn("Failed to publish engine events", { count: events.length, error: result.error });
    }
  }
}
