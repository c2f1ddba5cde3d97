/**
 * Preview - Snapshot cache and read-only fee ladders
 *
 * - refreshPreviewSnapshot is the only writer, throttled by snapshotCooldownSec
 * - previewFees / previewLadder / previewFeesFresh never return a new state
 * - Ask = trader pays quote for base, bid = trader sells base
 *
 * Fees decay from lastFeeBps to the caller's tick, as a swap at that tick would.
 */

import { err, ok, type Result } from "neverthrow";

import { evaluateDivergence } from "./divergence";
import type { DivergenceError, OracleError, PreviewError } from "./errors";
import { computeFee } from "./fee-curve";
import { fillExactIn, inventoryDeviationBps, tradeDirection } from "./inventory";
import { baseToQuote } from "./math";
import { enforceConfidenceCap, fuseOracle } from "./oracle-fusion";
import type {
  Amount,
  Bps,
  EngineConfig,
  EngineEvent,
  OracleMode,
  OracleReadings,
  PoolState,
  PoolTokens,
  PreviewConfig,
  PreviewSnapshot,
  PriceWad,
  QuoteReason,
  Sec,
  Tick,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Ladder multiples of s0 */
export const LADDER_MULTIPLES = [1n, 2n, 5n, 10n, 20n, 50n] as const;

export interface PreviewFees {
  askFeeBps: Bps[];
  bidFeeBps: Bps[];
}

export interface LadderRow {
  sizeBase: Amount;
  askFeeBps: Bps;
  bidFeeBps: Bps;
  /** Base out for a quote-in trade worth sizeBase at mid */
  askAmountOut: Amount;
  /** Quote out for a base-in trade of sizeBase */
  bidAmountOut: Amount;
  askReason: QuoteReason;
  bidReason: QuoteReason;
}

export interface PreviewLadder {
  rows: LadderRow[];
  snapshotTimestamp: Sec;
  snapshotMid: PriceWad;
}

export interface RefreshOutcome {
  refreshed: boolean;
  snapshot: PreviewSnapshot;
  nextState: PoolState;
  events: EngineEvent[];
}

export type PreviewFeeError = PreviewError | DivergenceError | OracleError;

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot
// ─────────────────────────────────────────────────────────────────────────────

export function requireSnapshot(
  preview: PreviewSnapshot | undefined,
  nowSec: Sec,
  config: PreviewConfig,
): Result<PreviewSnapshot, PreviewError> {
  if (preview === undefined) {
    return err({ type: "PREVIEW_SNAPSHOT_UNSET", message: "Preview snapshot has not been refreshed" });
  }
  const ageSec = nowSec - preview.timestamp;
  if (config.revertOnStalePreview && ageSec > config.maxAgeSec) {
    return err({
      type: "PREVIEW_SNAPSHOT_STALE",
      ageSec,
      maxAgeSec: config.maxAgeSec,
      message: `Preview snapshot is ${ageSec}s old (max ${config.maxAgeSec}s)`,
    });
  }
  return ok(preview);
}

function buildSnapshot(
  state: PoolState,
  readings: OracleReadings,
  mode: OracleMode,
  nowSec: Sec,
  config: EngineConfig,
): Result<PreviewSnapshot, OracleError> {
  return fuseOracle(readings, config.oracle, config.flags, state.sigma.sigmaBps)
    .andThen((fused) => enforceConfidenceCap(fused, config.oracle, mode))
    .map((fused) => ({
      timestamp: nowSec,
      midUsed: fused.midUsed,
      sigmaBps: state.sigma.sigmaBps,
      confBps: fused.confidenceBps,
      divergenceBps: fused.deltaBps ?? 0,
      spreadBps: fused.spreadBps,
    }));
}

/**
 * Fuse the oracles and store a new snapshot, unless the previous one is
 * still inside the refresh cooldown.
 */
export function refreshPreviewSnapshot(
  state: PoolState,
  readings: OracleReadings,
  mode: OracleMode,
  nowSec: Sec,
  config: EngineConfig,
): Result<RefreshOutcome, OracleError> {
  const current = state.preview;
  if (current !== undefined && nowSec - current.timestamp < config.preview.snapshotCooldownSec) {
    return ok({ refreshed: false, snapshot: current, nextState: state, events: [] });
  }

  return buildSnapshot(state, readings, mode, nowSec, config).map((snapshot): RefreshOutcome => ({
    refreshed: true,
    snapshot,
    nextState: { ...state, preview: snapshot },
    events: [
      {
        type: "PREVIEW_SNAPSHOT_REFRESHED",
        timestamp: snapshot.timestamp,
        midUsed: snapshot.midUsed,
        confBps: snapshot.confBps,
        divergenceBps: snapshot.divergenceBps,
      },
    ],
  }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Fees
// ─────────────────────────────────────────────────────────────────────────────

function sideFee(
  state: PoolState,
  snapshot: PreviewSnapshot,
  haircutBps: Bps,
  sizeBase: Amount,
  isBaseIn: boolean,
  tick: Tick,
  config: EngineConfig,
  tokens: PoolTokens,
): Bps {
  return computeFee(
    state.fee,
    {
      confidenceBps: snapshot.confBps,
      deviationBps: inventoryDeviationBps(state.inventory, snapshot.midUsed, tokens),
      direction: tradeDirection(state.inventory, isBaseIn),
      spreadBps: snapshot.spreadBps,
      sigmaBps: snapshot.sigmaBps,
      haircutBps,
      tradeNotional: baseToQuote(sizeBase, snapshot.midUsed, tokens),
      tick,
    },
    config,
  ).feeBps;
}

function snapshotHaircut(state: PoolState, snapshot: PreviewSnapshot, config: EngineConfig): Result<Bps, DivergenceError> {
  const delta = snapshot.divergenceBps > 0 ? snapshot.divergenceBps : undefined;
  return evaluateDivergence(state.divergence, delta, config.oracle, config.flags).map((outcome) => outcome.haircutBps);
}

function feesFromSnapshot(
  state: PoolState,
  snapshot: PreviewSnapshot,
  sizes: readonly Amount[],
  tick: Tick,
  config: EngineConfig,
  tokens: PoolTokens,
): Result<PreviewFees, DivergenceError> {
  return snapshotHaircut(state, snapshot, config).map((haircutBps) => ({
    askFeeBps: sizes.map((size) => sideFee(state, snapshot, haircutBps, size, false, tick, config, tokens)),
    bidFeeBps: sizes.map((size) => sideFee(state, snapshot, haircutBps, size, true, tick, config, tokens)),
  }));
}

/**
 * Ask and bid fees for base-denominated sizes, from the cached snapshot.
 */
export function previewFees(
  state: PoolState,
  sizes: readonly Amount[],
  nowSec: Sec,
  tick: Tick,
  config: EngineConfig,
  tokens: PoolTokens,
): Result<PreviewFees, PreviewFeeError> {
  return requireSnapshot(state.preview, nowSec, config.preview).andThen((snapshot) =>
    feesFromSnapshot(state, snapshot, sizes, tick, config, tokens),
  );
}

/**
 * Same as previewFees but fused from live readings. The snapshot is not stored.
 */
export function previewFeesFresh(
  state: PoolState,
  readings: OracleReadings,
  mode: OracleMode,
  sizes: readonly Amount[],
  nowSec: Sec,
  tick: Tick,
  config: EngineConfig,
  tokens: PoolTokens,
): Result<PreviewFees, PreviewFeeError> {
  if (!config.preview.enablePreviewFresh) {
    return err({ type: "PREVIEW_FRESH_DISABLED", message: "Fresh previews are disabled" });
  }
  return buildSnapshot(state, readings, mode, nowSec, config).andThen((snapshot) =>
    feesFromSnapshot(state, snapshot, sizes, tick, config, tokens),
  );
}

/**
 * Fee and output ladder at 1, 2, 5, 10, 20 and 50 × s0.
 */
export function previewLadder(
  state: PoolState,
  s0Base: Amount,
  nowSec: Sec,
  tick: Tick,
  config: EngineConfig,
  tokens: PoolTokens,
): Result<PreviewLadder, PreviewFeeError> {
  const sizes = LADDER_MULTIPLES.map((multiple) => s0Base * multiple);

  return requireSnapshot(state.preview, nowSec, config.preview).andThen((snapshot) =>
    snapshotHaircut(state, snapshot, config).map((haircutBps) => {
      const common = {
        mid: snapshot.midUsed,
        inventory: state.inventory,
        floorBps: config.inventory.floorBps,
        tokens,
      };
      const rows = sizes.map((sizeBase): LadderRow => {
        const askFeeBps = sideFee(state, snapshot, haircutBps, sizeBase, false, tick, config, tokens);
        const bidFeeBps = sideFee(state, snapshot, haircutBps, sizeBase, true, tick, config, tokens);
        const ask = fillExactIn({
          ...common,
          amountIn: baseToQuote(sizeBase, snapshot.midUsed, tokens),
          isBaseIn: false,
          feeBps: askFeeBps,
        });
        const bid = fillExactIn({ ...common, amountIn: sizeBase, isBaseIn: true, feeBps: bidFeeBps });
        return {
          sizeBase,
          askFeeBps,
          bidFeeBps,
          askAmountOut: ask.amountOut,
          bidAmountOut: bid.amountOut,
          askReason: ask.partial ? "FLOOR" : "OK",
          bidReason: bid.partial ? "FLOOR" : "OK",
        };
      });
      return { rows, snapshotTimestamp: snapshot.timestamp, snapshotMid: snapshot.midUsed };
    }),
  );
}
