/**
 * Auto-Recenter - Threshold, cooldown and re-arm gated retargeting
 *
 * Idle → Eligible (price moved ≥ threshold since last rebalance, cooldown
 * elapsed, armed) → Committed (target set to a 50/50 value split at mid,
 * disarmed) → Idle.
 *
 * Re-arming needs `recenterRearmCount` consecutive observations under the
 * threshold. Manual and automatic triggers share this state.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { RecenterError } from "./errors";
import { BPS_NUM, absDiff, baseToQuote, quoteToBase, toBps } from "./math";
import type {
  Bps,
  EngineEvent,
  InventoryConfig,
  InventoryState,
  PoolTokens,
  PriceWad,
  RecenterState,
  RecenterTrigger,
  Sec,
} from "./types";

export interface RecenterContext {
  inventory: InventoryState;
  recenter: RecenterState;
  mid: PriceWad;
  nowSec: Sec;
  config: InventoryConfig;
  tokens: PoolTokens;
}

export interface RecenterOutcome {
  inventory: InventoryState;
  recenter: RecenterState;
  event?: EngineEvent;
}

export const createInitialRecenterState = (): RecenterState => ({
  armed: true,
  healthyStreak: 0,
});

/**
 * Price move since the last rebalance in bps.
 * A pool that was never rebalanced reports a full 100% move.
 */
export function priceDeviationBps(lastRebalancePrice: PriceWad, mid: PriceWad): Bps {
  if (lastRebalancePrice === 0n) return BPS_NUM;
  return toBps(absDiff(mid, lastRebalancePrice), lastRebalancePrice);
}

export function recenterThresholdBps(config: InventoryConfig): Bps {
  return config.recenterThresholdPct * 100;
}

export function cooldownRemainingSec(inventory: InventoryState, nowSec: Sec, config: InventoryConfig): Sec {
  const elapsed = nowSec - inventory.lastRebalanceAt;
  return Math.max(config.recenterCooldownSec - elapsed, 0);
}

/**
 * Base amount worth half of the pool's total value at mid.
 */
export function fiftyFiftyTarget(inventory: InventoryState, mid: PriceWad, tokens: PoolTokens): bigint {
  const totalNotional = baseToQuote(inventory.baseReserves, mid, tokens) + inventory.quoteReserves;
  return quoteToBase(totalNotional / 2n, mid, tokens);
}

function commit(ctx: RecenterContext, trigger: RecenterTrigger, deviationBps: Bps): RecenterOutcome {
  const newTarget = fiftyFiftyTarget(ctx.inventory, ctx.mid, ctx.tokens);
  return {
    inventory: {
      ...ctx.inventory,
      targetBaseStar: newTarget,
      lastRebalancePrice: ctx.mid,
      lastRebalanceAt: ctx.nowSec,
    },
    recenter: { armed: ctx.config.recenterRearmCount === 0, healthyStreak: 0 },
    event: {
      type: "RECENTER_COMMITTED",
      trigger,
      price: ctx.mid,
      previousTarget: ctx.inventory.targetBaseStar,
      newTarget,
      deviationBps,
    },
  };
}

/**
 * Permissionless trigger. Fails explicitly instead of no-op.
 * The caller is responsible for rejecting fallback or stale oracle mids.
 */
export function manualRecenter(ctx: RecenterContext): Result<RecenterOutcome, RecenterError> {
  const deviationBps = priceDeviationBps(ctx.inventory.lastRebalancePrice, ctx.mid);
  const thresholdBps = recenterThresholdBps(ctx.config);
  if (deviationBps < thresholdBps) {
    return err({
      type: "RECENTER_THRESHOLD",
      deviationBps,
      thresholdBps,
      message: `Price moved ${deviationBps} bps since last rebalance, threshold is ${thresholdBps} bps`,
    });
  }

  const remainingSec = cooldownRemainingSec(ctx.inventory, ctx.nowSec, ctx.config);
  if (remainingSec > 0 || !ctx.recenter.armed) {
    return err({
      type: "RECENTER_COOLDOWN",
      remainingSec,
      armed: ctx.recenter.armed,
      message: ctx.recenter.armed
        ? `Recenter cooldown has ${remainingSec}s remaining`
        : "Recenter is disarmed until enough healthy observations arrive",
    });
  }

  return ok(commit(ctx, "manual", deviationBps));
}

/**
 * Automatic path, run once after each successful swap.
 * Advances the re-arm streak and commits when eligible and `autoCommit` is set.
 */
export function observeRecenter(ctx: RecenterContext, autoCommit: boolean): RecenterOutcome {
  const deviationBps = priceDeviationBps(ctx.inventory.lastRebalancePrice, ctx.mid);
  const thresholdBps = recenterThresholdBps(ctx.config);

  if (deviationBps < thresholdBps) {
    if (ctx.recenter.armed) return { inventory: ctx.inventory, recenter: ctx.recenter };
    const healthyStreak = ctx.recenter.healthyStreak + 1;
    const armed = healthyStreak >= ctx.config.recenterRearmCount;
    return {
      inventory: ctx.inventory,
      recenter: { armed, healthyStreak: armed ? 0 : healthyStreak },
    };
  }

  if (!ctx.recenter.armed) {
    return { inventory: ctx.inventory, recenter: { armed: false, healthyStreak: 0 } };
  }
  if (autoCommit && cooldownRemainingSec(ctx.inventory, ctx.nowSec, ctx.config) === 0) {
    return commit(ctx, "auto", deviationBps);
  }
  return { inventory: ctx.inventory, recenter: ctx.recenter };
}
