/**
 * Swap Engine - Pure evaluation of one swap or quote request
 *
 * Pipeline:
 * 1. Oracle fusion and confidence cap (strict breach may route to AOMQ)
 * 2. Divergence gate (hard band rejects, soft band may route to AOMQ)
 * 3. Inventory deviation and trade direction
 * 4. Fee curve, near-floor AOMQ check, rebate
 * 5. Floor-protected fill
 * 6. Next state: reserves, fee, divergence, sigma, auto-recenter
 *
 * Returns the full next state; the caller decides whether to commit it.
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { aomqActivatedEvent, emergencyQuote, isNearFloor, type EmergencyQuote } from "./aomq";
import { createInitialDivergenceState, evaluateDivergence } from "./divergence";
import type { EngineError, OracleError } from "./errors";
import { applyRebate, computeFee } from "./fee-curve";
import { applyFill, fillExactIn, inventoryDeviationBps, tradeDirection, tradeNotional, type FillResult } from "./inventory";
import { enforceConfidenceCap, fuseOracle, updateSigma } from "./oracle-fusion";
import { createInitialRecenterState, manualRecenter, observeRecenter, type RecenterOutcome } from "./recenter";
import type {
  Amount,
  AomqTrigger,
  Bps,
  ClampFlag,
  EngineConfig,
  EngineEvent,
  FusedQuote,
  OracleReadings,
  PoolState,
  PoolTokens,
  PriceWad,
  QuoteReason,
  Sec,
  SwapInput,
  SwapOutput,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Initial State
// ─────────────────────────────────────────────────────────────────────────────

export interface InitialPoolParams {
  baseReserves: Amount;
  quoteReserves: Amount;
  /** Defaults to the current base reserves */
  targetBaseStar?: Amount;
  baseFeeBps: Bps;
}

export function createInitialPoolState(params: InitialPoolParams): PoolState {
  return {
    fee: { lastFeeBps: params.baseFeeBps, lastTick: 0 },
    divergence: createInitialDivergenceState(),
    sigma: { sigmaBps: 0, lastMid: 0n, lastTick: 0 },
    inventory: {
      baseReserves: params.baseReserves,
      quoteReserves: params.quoteReserves,
      targetBaseStar: params.targetBaseStar ?? params.baseReserves,
      lastRebalancePrice: 0n,
      lastRebalanceAt: 0,
    },
    recenter: createInitialRecenterState(),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Append without duplicates, keeping first-applied order */
function addFlag(flags: ClampFlag[], flag: ClampFlag): void {
  if (!flags.includes(flag)) flags.push(flag);
}

interface GateOutcome {
  fused: FusedQuote;
  aomqTrigger?: AomqTrigger;
  /** Error to surface if the emergency quote cannot be honoured */
  pendingError?: OracleError;
}

function gateConfidence(input: SwapInput, fused: FusedQuote): Result<GateOutcome, OracleError> {
  const { config, mode } = input;
  const capped = enforceConfidenceCap(fused, config.oracle, mode);
  if (capped.isOk()) return ok({ fused });
  if (!config.flags.enableAOMQ) return err(capped.error);
  const outcome: GateOutcome = { fused, aomqTrigger: "CONF_CAP", pendingError: capped.error };
  return ok(outcome);
}

// ─────────────────────────────────────────────────────────────────────────────
// Swap Evaluation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Evaluate one exact-in request against the current state.
 */
export function evaluateSwap(input: SwapInput): Result<SwapOutput, EngineError> {
  const { state, config, tokens, amountIn, isBaseIn, readings, nowSec, tick } = input;
  const { flags } = config;

  if (amountIn <= 0n) {
    return err({ type: "ZERO_AMOUNT", message: "amountIn must be positive" });
  }

  const fusedResult = fuseOracle(readings, config.oracle, flags, state.sigma.sigmaBps);
  if (fusedResult.isErr()) return err(fusedResult.error);

  const gateResult = gateConfidence(input, fusedResult.value);
  if (gateResult.isErr()) return err(gateResult.error);
  const { fused, pendingError } = gateResult.value;
  let aomqTrigger = gateResult.value.aomqTrigger;

  const clampFlags: ClampFlag[] = [];
  if (fused.usedFallback) addFlag(clampFlags, "FALLBACK");

  const divergenceResult = evaluateDivergence(state.divergence, fused.deltaBps, config.oracle, flags);
  if (divergenceResult.isErr()) return err(divergenceResult.error);
  const divergence = divergenceResult.value;
  if (divergence.softBand && flags.enableAOMQ && aomqTrigger === undefined) {
    aomqTrigger = "SOFT_DIVERGENCE";
  }

  const mid = fused.midUsed;
  const feeComputation = computeFee(
    state.fee,
    {
      confidenceBps: fused.confidenceBps,
      deviationBps: inventoryDeviationBps(state.inventory, mid, tokens),
      direction: tradeDirection(state.inventory, isBaseIn),
      spreadBps: fused.spreadBps,
      sigmaBps: state.sigma.sigmaBps,
      haircutBps: divergence.haircutBps,
      tradeNotional: tradeNotional(amountIn, isBaseIn, mid, tokens),
      tick,
    },
    config,
  );
  for (const flag of feeComputation.clampFlags) addFlag(clampFlags, flag);

  if (
    flags.enableAOMQ &&
    aomqTrigger === undefined &&
    isNearFloor(state.inventory, isBaseIn, config.inventory.floorBps, config.aomq.floorEpsilonBps)
  ) {
    aomqTrigger = "NEAR_FLOOR";
  }

  const events: EngineEvent[] = [...divergence.events];
  let emergency: EmergencyQuote | undefined;
  if (aomqTrigger !== undefined) {
    emergency = emergencyQuote({
      amountIn,
      isBaseIn,
      mid,
      feeBps: feeComputation.feeBps,
      inventory: state.inventory,
      config,
      tokens,
    });
    if (emergency === undefined && pendingError !== undefined) return err(pendingError);
  }

  let feeBpsUsed: Bps;
  let fill: FillResult;
  let reason: QuoteReason;
  if (aomqTrigger !== undefined && emergency !== undefined) {
    feeBpsUsed = emergency.feeBps;
    fill = emergency.fill;
    reason = "AOMQ_CLAMP";
    addFlag(clampFlags, "AOMQ");
    if (fill.partial) addFlag(clampFlags, "FLOOR");
    events.push(aomqActivatedEvent(aomqTrigger, isBaseIn, emergency));
  } else {
    feeBpsUsed = feeComputation.feeBps;
    const rebateBps = flags.enableRebates && input.caller !== undefined ? (config.rebates.rebates[input.caller] ?? 0) : 0;
    if (rebateBps > 0) {
      const rebated = applyRebate(feeBpsUsed, rebateBps, config.fee, feeComputation.bboFloorBps);
      if (rebated < feeBpsUsed) addFlag(clampFlags, "REBATE");
      feeBpsUsed = rebated;
    }
    fill = fillExactIn({
      amountIn,
      isBaseIn,
      mid,
      feeBps: feeBpsUsed,
      inventory: state.inventory,
      floorBps: config.inventory.floorBps,
      tokens,
    });
    reason = fill.partial ? "FLOOR" : "OK";
    if (fill.partial) addFlag(clampFlags, "FLOOR");
  }

  const inventory = applyFill(state.inventory, isBaseIn, fill);
  const recenter: RecenterOutcome = fused.usedFallback
    ? { inventory, recenter: state.recenter }
    : observeRecenter(
        { inventory, recenter: state.recenter, mid, nowSec, config: config.inventory, tokens },
        flags.enableAutoRecenter,
      );
  if (recenter.event !== undefined) events.push(recenter.event);

  const nextState: PoolState = {
    ...state,
    fee: feeComputation.nextState,
    divergence: divergence.state,
    sigma: updateSigma(state.sigma, mid, tick, config.oracle.sigmaEwmaLambdaBps),
    inventory: recenter.inventory,
    recenter: recenter.recenter,
  };

  return ok({
    result: {
      amountIn,
      amountOut: fill.amountOut,
      midUsed: mid,
      feeBpsUsed,
      partialFillAmountIn: fill.amountInUsed,
      usedFallback: fused.usedFallback,
      reason,
      clampFlags,
    },
    nextState,
    events,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Manual Recenter
// ─────────────────────────────────────────────────────────────────────────────

export interface RebalanceInput {
  state: PoolState;
  config: EngineConfig;
  tokens: PoolTokens;
  readings: OracleReadings;
  nowSec: Sec;
}

export interface RebalanceOutput {
  nextState: PoolState;
  newTarget: Amount;
  price: PriceWad;
  events: EngineEvent[];
}

/**
 * Permissionless recenter. Needs a fresh primary mid: any fallback makes it ineligible.
 */
export function evaluateRebalance(input: RebalanceInput): Result<RebalanceOutput, EngineError> {
  const { state, config, tokens, readings, nowSec } = input;

  return fuseOracle(readings, config.oracle, config.flags, state.sigma.sigmaBps)
    .andThen((fused): Result<FusedQuote, EngineError> => {
      if (!fused.usedFallback) return ok(fused);
      return err({
        type: "ORACLE_STALE",
        ageSec: readings.primary.ageSec,
        maxAgeSec: config.oracle.maxAgeSec,
        message: `Recenter needs a fresh primary mid, got ${fused.sourceReason}`,
      });
    })
    .andThen((fused) =>
      manualRecenter({
        inventory: state.inventory,
        recenter: state.recenter,
        mid: fused.midUsed,
        nowSec,
        config: config.inventory,
        tokens,
      }).map((outcome): RebalanceOutput => ({
        nextState: { ...state, inventory: outcome.inventory, recenter: outcome.recenter },
        newTarget: outcome.inventory.targetBaseStar,
        price: fused.midUsed,
        events: outcome.event === undefined ? [] : [outcome.event],
      })),
    );
}
