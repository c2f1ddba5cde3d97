/**
 * Oracle Fusion - Validity gate and confidence blend over two price sources
 *
 * - Source order: fresh primary, then primary EMA, then fresh secondary
 * - Any source that errors while being consulted fails the call
 * - Confidence is the max of three weighted, capped components
 * - Volatility EWMA bookkeeping for the sigma component
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { OracleError } from "./errors";
import { absDiff, deltaBpsBetween, toBps } from "./math";
import type {
  Bps,
  FeatureFlags,
  FusedQuote,
  OracleConfig,
  OracleMode,
  OracleReadings,
  OracleSample,
  OracleSourceReason,
  PriceWad,
  SigmaState,
  Tick,
} from "./types";

const BPS_SCALE = 10_000;

/**
 * A sample is usable when it reports ok, carries a positive mid and is within the age bound.
 */
export function isFresh(sample: OracleSample | undefined, maxAgeSec: number): sample is OracleSample & { mid: PriceWad } {
  if (sample === undefined) return false;
  return sample.status === "ok" && sample.mid !== undefined && sample.mid > 0n && sample.ageSec <= maxAgeSec;
}

/**
 * Bid/ask spread of a sample relative to its mid, when observable.
 */
export function sampleSpreadBps(sample: OracleSample): Bps | undefined {
  const { bid, ask, mid } = sample;
  if (bid === undefined || ask === undefined || mid === undefined) return undefined;
  if (bid <= 0n || ask < bid || mid <= 0n) return undefined;
  return toBps(ask - bid, mid);
}

function weighted(valueBps: Bps, weightBps: Bps, capBps: Bps): Bps {
  return Math.min(Math.floor((valueBps * weightBps) / BPS_SCALE), capBps);
}

function readFailed(source: "primary" | "ema" | "secondary", sample: OracleSample): OracleError {
  const detail = sample.detail ?? "read failed";
  return { type: "ORACLE_READ_FAILED", source, message: `Oracle ${source} read failed: ${detail}` };
}

interface SelectedMid {
  mid: PriceWad;
  reason: OracleSourceReason;
}

function selectMid(readings: OracleReadings, cfg: OracleConfig): Result<SelectedMid, OracleError> {
  const { primary, ema, secondary } = readings;

  if (isFresh(primary, cfg.maxAgeSec)) {
    return ok({ mid: primary.mid, reason: "PRIMARY" });
  }

  if (cfg.allowEmaFallback && ema !== undefined) {
    if (ema.status === "error") return err(readFailed("ema", ema));
    if (isFresh(ema, cfg.maxAgeSec)) {
      return ok({ mid: ema.mid, reason: "EMA_FALLBACK" });
    }
  }

  if (isFresh(secondary, cfg.secondaryMaxAgeSec)) {
    return ok({ mid: secondary.mid, reason: "SECONDARY_FALLBACK" });
  }

  const staleMidSeen = (primary.mid ?? 0n) > 0n || (ema?.mid ?? 0n) > 0n;
  const fallbackPermitted = cfg.allowEmaFallback || secondary !== undefined;
  if (staleMidSeen && !fallbackPermitted) {
    return err({
      type: "ORACLE_STALE",
      ageSec: primary.ageSec,
      maxAgeSec: cfg.maxAgeSec,
      message: `Primary oracle is ${primary.ageSec}s old (max ${cfg.maxAgeSec}s) and no fallback is permitted`,
    });
  }
  return err({ type: "MID_UNSET", message: "No oracle source produced a usable mid" });
}

/**
 * Fuse the readings into one mid and a blended confidence.
 *
 * @param sigmaBps - Volatility EWMA from the previous observation
 */
export function fuseOracle(
  readings: OracleReadings,
  cfg: OracleConfig,
  flags: FeatureFlags,
  sigmaBps: Bps,
): Result<FusedQuote, OracleError> {
  // Fail closed on explicit transport failures before looking at freshness
  if (readings.primary.status === "error") return err(readFailed("primary", readings.primary));
  if (readings.secondary?.status === "error") return err(readFailed("secondary", readings.secondary));

  return selectMid(readings, cfg).map(({ mid, reason }) => {
    const { primary, secondary } = readings;
    const secondaryFresh = isFresh(secondary, cfg.secondaryMaxAgeSec);

    const spreadBps = reason === "PRIMARY" ? sampleSpreadBps(primary) : undefined;
    const deltaBps =
      secondaryFresh && reason !== "SECONDARY_FALLBACK" && secondary?.mid !== undefined
        ? deltaBpsBetween(mid, secondary.mid)
        : undefined;

    const confSpreadBps = weighted(spreadBps ?? 0, cfg.confWeightSpreadBps, cfg.confCapBpsSpot);
    const confSigmaBps = weighted(sigmaBps, cfg.confWeightSigmaBps, cfg.confCapBpsSpot);
    const confSecondaryBps =
      secondaryFresh && secondary?.confidenceBps !== undefined
        ? weighted(secondary.confidenceBps, cfg.confWeightSecondaryBps, cfg.confCapBpsSpot)
        : 0;

    const confidenceBps = flags.blendOn ? Math.max(confSpreadBps, confSigmaBps, confSecondaryBps) : confSpreadBps;

    return {
      midUsed: mid,
      usedFallback: reason !== "PRIMARY",
      sourceReason: reason,
      deltaBps,
      confidenceBps,
      spreadBps,
      confSpreadBps,
      confSigmaBps,
      confSecondaryBps,
    };
  });
}

/**
 * Strict mode rejects a blended confidence above the strict cap.
 */
export function enforceConfidenceCap(
  fused: FusedQuote,
  cfg: OracleConfig,
  mode: OracleMode,
): Result<FusedQuote, OracleError> {
  if (mode === "strict" && fused.confidenceBps > cfg.confCapBpsStrict) {
    return err({
      type: "CONF_CAP_EXCEEDED",
      confidenceBps: fused.confidenceBps,
      capBps: cfg.confCapBpsStrict,
      message: `Confidence ${fused.confidenceBps} bps exceeds strict cap ${cfg.confCapBpsStrict} bps`,
    });
  }
  return ok(fused);
}

/**
 * Advance the volatility EWMA with a new mid.
 *
 * sigma' = floor((λ × sigma + (10_000 − λ) × |Δmid| bps) / 10_000)
 *
 * Advances at most once per tick; the first observation only seeds lastMid.
 */
export function updateSigma(state: SigmaState, mid: PriceWad, tick: Tick, lambdaBps: Bps): SigmaState {
  if (state.lastMid === 0n) {
    return { sigmaBps: state.sigmaBps, lastMid: mid, lastTick: tick };
  }
  if (tick <= state.lastTick) return state;

  const moveBps = toBps(absDiff(mid, state.lastMid), state.lastMid);
  const sigmaBps = Math.floor((lambdaBps * state.sigmaBps + (BPS_SCALE - lambdaBps) * moveBps) / BPS_SCALE);
  return { sigmaBps, lastMid: mid, lastTick: tick };
}
