/**
 * Fee Curve - Multi-signal dynamic fee
 *
 * target  = base + confTerm + invTerm(direction) + sizeTerm + lvrTerm + haircut
 * target  = max(target, bboFloor)
 * fee     = clamp(max(target, decay(lastFee, elapsed)), base, cap)
 *
 * The fee is non-decreasing in confidence and in inventory deviation for every
 * trade direction. The restoring-side tilt discount is bounded by the
 * inventory term through the config cross-check in param-gate.ts.
 *
 * This module is pure (no I/O, no throw).
 */

import { WAD, clamp, minBig, sqrt } from "./math";
import type { TradeDirection } from "./inventory";
import type { Amount, Bps, ClampFlag, EngineConfig, FeeConfig, FeeState, InventoryConfig, MakerConfig, Tick } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface FeeSignals {
  confidenceBps: Bps;
  deviationBps: Bps;
  direction: TradeDirection;
  spreadBps?: Bps;
  sigmaBps: Bps;
  haircutBps: Bps;
  /** Quote-unit notional of the requested trade */
  tradeNotional: Amount;
  tick: Tick;
}

export interface FeeTerms {
  confBps: Bps;
  inventoryBps: Bps;
  sizeBps: Bps;
  lvrBps: Bps;
  haircutBps: Bps;
}

export interface FeeComputation {
  feeBps: Bps;
  targetBps: Bps;
  decayedBps: Bps;
  bboFloorBps: Bps;
  terms: FeeTerms;
  clampFlags: ClampFlag[];
  nextState: FeeState;
}

/** Fixed-point scale of the tilt weight product (bps × bps) */
const TILT_SCALE = 100_000_000n;

// ─────────────────────────────────────────────────────────────────────────────
// Terms
// ─────────────────────────────────────────────────────────────────────────────

export function confidenceTerm(confidenceBps: Bps, fee: FeeConfig): Bps {
  return Math.floor((confidenceBps * fee.alphaNumerator) / fee.alphaDenominator);
}

interface TiltOptions {
  enabled: boolean;
  confidenceBps: Bps;
  spreadBps: Bps;
}

/**
 * Inventory deviation term with the tilt folded in.
 *
 * Worsening: floor(β·dev + min(perPct·dev/100 · (1 + W/1e8), tiltMax))
 * Restoring: floor(max(β·dev − min(perPct·dev/100 / (1 + W/1e8), tiltMax), 0))
 * where W = tiltConfWeight·conf + tiltSpreadWeight·spread.
 */
export function inventoryTerm(
  deviationBps: Bps,
  direction: TradeDirection,
  fee: FeeConfig,
  inventory: InventoryConfig,
  tilt: TiltOptions,
): { bps: Bps; tiltApplied: boolean } {
  const dev = BigInt(deviationBps);
  const betaNum = BigInt(fee.betaInvDevNumerator) * dev;
  const betaDen = BigInt(fee.betaInvDevDenominator);

  if (!tilt.enabled || direction === "NEUTRAL" || dev === 0n || inventory.invTiltBpsPer1pct === 0) {
    return { bps: Number(betaNum / betaDen), tiltApplied: false };
  }

  const weight =
    BigInt(inventory.tiltConfWeightBps) * BigInt(tilt.confidenceBps) +
    BigInt(inventory.tiltSpreadWeightBps) * BigInt(tilt.spreadBps);
  const perPctDev = BigInt(inventory.invTiltBpsPer1pct) * dev;
  const maxTilt = BigInt(inventory.invTiltMaxBps);

  let tiltNum: bigint;
  let tiltDen: bigint;
  if (direction === "WORSENS") {
    tiltNum = perPctDev * (TILT_SCALE + weight);
    tiltDen = 100n * TILT_SCALE;
  } else {
    tiltNum = perPctDev * TILT_SCALE;
    tiltDen = 100n * (TILT_SCALE + weight);
  }
  if (tiltNum >= maxTilt * tiltDen) {
    tiltNum = maxTilt;
    tiltDen = 1n;
  }

  // One exact rational, floored once
  const den = betaDen * tiltDen;
  const baseScaled = betaNum * tiltDen;
  const tiltScaled = tiltNum * betaDen;
  const total = direction === "WORSENS" ? baseScaled + tiltScaled : baseScaled - tiltScaled;
  const bps = total <= 0n ? 0 : Number(total / den);
  return { bps, tiltApplied: tiltNum > 0n };
}

/**
 * min(γlin·r + γquad·r², sizeFeeCap) with r = notional / s0 in WAD precision.
 */
export function sizeTerm(tradeNotional: Amount, fee: FeeConfig, maker: MakerConfig): Bps {
  if (maker.s0Notional <= 0n || tradeNotional <= 0n) return 0;
  const ratio = (tradeNotional * WAD) / maker.s0Notional;
  const scaled = BigInt(fee.gammaSizeLinBps) * ratio + (BigInt(fee.gammaSizeQuadBps) * ratio * ratio) / WAD;
  return Number(minBig(scaled / WAD, BigInt(fee.sizeFeeCapBps)));
}

/**
 * min(κ·σ·sqrt(ttlSec) / 10_000, lvrFeeCap)
 */
export function lvrTerm(sigmaBps: Bps, fee: FeeConfig, maker: MakerConfig): Bps {
  // sqrt(ttlMs / 1000) = sqrt(ttlMs × 1000) / 1000
  const rootTtl = sqrt(BigInt(maker.ttlMs) * 1_000n);
  const raw = (BigInt(fee.kappaLvrBps) * BigInt(sigmaBps) * rootTtl) / 10_000_000n;
  return Number(minBig(raw, BigInt(fee.lvrFeeCapBps)));
}

/**
 * alphaBbo × spread / 10_000, or the absolute betaFloor when no spread is observable.
 */
export function bboFloorBps(spreadBps: Bps | undefined, maker: MakerConfig): Bps {
  if (spreadBps === undefined) return maker.betaFloorBps;
  return Math.floor((maker.alphaBboBps * spreadBps) / 10_000);
}

// ─────────────────────────────────────────────────────────────────────────────
// Decay
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Geometric decay of the excess over base, one step per elapsed tick.
 * Never undershoots base.
 */
export function decayFee(lastFeeBps: Bps, baseBps: Bps, decayPct: number, elapsedTicks: number): Bps {
  if (lastFeeBps <= baseBps) return baseBps;
  if (elapsedTicks <= 0 || decayPct === 0) return lastFeeBps;

  let excess = lastFeeBps - baseBps;
  for (let i = 0; i < elapsedTicks && excess > 0; i++) {
    excess = Math.floor((excess * (100 - decayPct)) / 100);
  }
  return baseBps + excess;
}

// ─────────────────────────────────────────────────────────────────────────────
// Composition
// ─────────────────────────────────────────────────────────────────────────────

export function computeFee(state: FeeState, signals: FeeSignals, config: EngineConfig): FeeComputation {
  const { fee, inventory, maker, flags } = config;
  const clampFlags: ClampFlag[] = [];

  const confBps = confidenceTerm(signals.confidenceBps, fee);
  const inv = inventoryTerm(signals.deviationBps, signals.direction, fee, inventory, {
    enabled: flags.enableInvTilt,
    confidenceBps: signals.confidenceBps,
    spreadBps: signals.spreadBps ?? 0,
  });
  if (inv.tiltApplied) clampFlags.push("INV_TILT");

  const sizeBps = flags.enableSizeFee ? sizeTerm(signals.tradeNotional, fee, maker) : 0;
  if (sizeBps > 0) clampFlags.push("SIZE_FEE");

  const lvrBps = flags.enableLvrFee ? lvrTerm(signals.sigmaBps, fee, maker) : 0;

  if (signals.haircutBps > 0) clampFlags.push("DIVERGENCE_HAIRCUT");

  let targetBps = fee.baseBps + confBps + inv.bps + sizeBps + lvrBps + signals.haircutBps;

  const floorBps = flags.enableBboFloor ? bboFloorBps(signals.spreadBps, maker) : 0;
  if (targetBps < floorBps) {
    targetBps = floorBps;
    clampFlags.push("BBO_FLOOR");
  }

  const decayedBps = decayFee(state.lastFeeBps, fee.baseBps, fee.decayPctPerBlock, signals.tick - state.lastTick);
  const candidate = Math.max(targetBps, decayedBps);
  if (candidate > fee.capBps) clampFlags.push("FEE_CAP");
  const feeBps = clamp(candidate, fee.baseBps, fee.capBps);

  return {
    feeBps,
    targetBps,
    decayedBps,
    bboFloorBps: floorBps,
    terms: { confBps, inventoryBps: inv.bps, sizeBps, lvrBps, haircutBps: signals.haircutBps },
    clampFlags,
    nextState: { lastFeeBps: feeBps, lastTick: signals.tick },
  };
}

/**
 * Per-caller rebate applied after floor and cap; never below the floor.
 */
export function applyRebate(feeBps: Bps, rebateBps: Bps, fee: FeeConfig, bboFloor: Bps): Bps {
  const minimum = Math.min(Math.max(fee.baseBps, bboFloor), fee.capBps);
  return Math.max(feeBps - rebateBps, minimum);
}
