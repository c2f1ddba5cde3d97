/**
 * Inventory Engine - Floor-protected fills and deviation math
 *
 * - Output is priced at the fused mid, the fee is taken on the output leg
 * - A fill that would breach the output reserve floor is cut so the reserve
 *   lands exactly on the floor; the consumed input is the round-up inverse
 * - Deviation is symmetric in which side is heavy
 *
 * This module is pure (no I/O, no throw).
 */

import { BPS, absDiff, baseToQuote, bpsOf, ceilDiv, minBig, quoteToBase, toBps } from "./math";
import type { Amount, Bps, InventoryState, PoolTokens, PriceWad } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type TradeDirection = "WORSENS" | "RESTORES" | "NEUTRAL";

export interface FillInput {
  amountIn: Amount;
  isBaseIn: boolean;
  mid: PriceWad;
  feeBps: Bps;
  inventory: InventoryState;
  floorBps: Bps;
  tokens: PoolTokens;
}

export interface FillResult {
  amountOut: Amount;
  /** Input actually consumed; equals amountIn on a full fill */
  amountInUsed: Amount;
  partial: boolean;
  /** Floor of the output reserve, measured before the trade */
  floor: Amount;
}

// ─────────────────────────────────────────────────────────────────────────────
// Floor & Deviation
// ─────────────────────────────────────────────────────────────────────────────

/** floor(reserve × floorBps / 10_000) */
export function floorAmount(reserve: Amount, floorBps: Bps): Amount {
  return bpsOf(reserve, floorBps);
}

export function outputReserve(inventory: InventoryState, isBaseIn: boolean): Amount {
  return isBaseIn ? inventory.quoteReserves : inventory.baseReserves;
}

/**
 * |baseNotional − targetNotional| × 10_000 / totalNotional, all in quote units at mid.
 */
export function inventoryDeviationBps(inventory: InventoryState, mid: PriceWad, tokens: PoolTokens): Bps {
  const baseNotional = baseToQuote(inventory.baseReserves, mid, tokens);
  const targetNotional = baseToQuote(inventory.targetBaseStar, mid, tokens);
  const totalNotional = baseNotional + inventory.quoteReserves;
  if (totalNotional === 0n) return 0;
  return toBps(absDiff(baseNotional, targetNotional), totalNotional);
}

/**
 * Whether a trade pushes base reserves further from target or back towards it.
 */
export function tradeDirection(inventory: InventoryState, isBaseIn: boolean): TradeDirection {
  if (inventory.baseReserves === inventory.targetBaseStar) return "NEUTRAL";
  const baseHeavy = inventory.baseReserves > inventory.targetBaseStar;
  return baseHeavy === isBaseIn ? "WORSENS" : "RESTORES";
}

// ─────────────────────────────────────────────────────────────────────────────
// Fills
// ─────────────────────────────────────────────────────────────────────────────

function grossOutput(amountIn: Amount, isBaseIn: boolean, mid: PriceWad, tokens: PoolTokens): Amount {
  return isBaseIn ? baseToQuote(amountIn, mid, tokens) : quoteToBase(amountIn, mid, tokens);
}

/**
 * Input needed (rounded up) to produce `grossOut` at mid.
 */
function inputForGross(grossOut: Amount, isBaseIn: boolean, mid: PriceWad, tokens: PoolTokens): Amount {
  return isBaseIn ? quoteToBase(grossOut, mid, tokens, "up") : baseToQuote(grossOut, mid, tokens, "up");
}

/**
 * Exact-in fill against the output reserve floor.
 */
export function fillExactIn(input: FillInput): FillResult {
  const { amountIn, isBaseIn, mid, feeBps, inventory, floorBps, tokens } = input;
  const feeKeep = BPS - BigInt(feeBps);

  const gross = grossOutput(amountIn, isBaseIn, mid, tokens);
  const amountOut = (gross * feeKeep) / BPS;

  const reserveOut = outputReserve(inventory, isBaseIn);
  const floor = floorAmount(reserveOut, floorBps);
  const available = reserveOut > floor ? reserveOut - floor : 0n;

  if (amountOut <= available) {
    return { amountOut, amountInUsed: amountIn, partial: false, floor };
  }

  const grossNeeded = ceilDiv(available * BPS, feeKeep);
  const amountInUsed = minBig(inputForGross(grossNeeded, isBaseIn, mid, tokens), amountIn);
  return { amountOut: available, amountInUsed, partial: true, floor };
}

/**
 * Post-trade reserves.
 */
export function applyFill(inventory: InventoryState, isBaseIn: boolean, fill: FillResult): InventoryState {
  if (isBaseIn) {
    return {
      ...inventory,
      baseReserves: inventory.baseReserves + fill.amountInUsed,
      quoteReserves: inventory.quoteReserves - fill.amountOut,
    };
  }
  return {
    ...inventory,
    baseReserves: inventory.baseReserves - fill.amountOut,
    quoteReserves: inventory.quoteReserves + fill.amountInUsed,
  };
}

/**
 * Quote-unit notional of a trade, used for size fees and AOMQ thresholds.
 */
export function tradeNotional(amount: Amount, isBase: boolean, mid: PriceWad, tokens: PoolTokens): Amount {
  return isBase ? baseToQuote(amount, mid, tokens) : amount;
}
