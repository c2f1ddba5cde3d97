/**
 * AOMQ - Emergency quoting instead of outright rejection
 *
 * Triggers:
 * - Soft-band divergence
 * - Strict confidence cap breach
 * - Output reserve within floorEpsilonBps of its floor
 *
 * The emergency quote raises the fee to emergencySpreadBps (capped) and clamps
 * the output to the floor. It is only honoured when the clamped output still
 * carries at least minQuoteNotional.
 *
 * This module is pure (no I/O, no throw).
 */

import { fillExactIn, floorAmount, outputReserve, tradeNotional, type FillResult } from "./inventory";
import { bpsOf } from "./math";
import type { Amount, AomqTrigger, Bps, EngineConfig, EngineEvent, InventoryState, PoolTokens, PriceWad } from "./types";

export interface EmergencyQuoteInput {
  amountIn: Amount;
  isBaseIn: boolean;
  mid: PriceWad;
  /** Fee the normal path computed */
  feeBps: Bps;
  inventory: InventoryState;
  config: EngineConfig;
  tokens: PoolTokens;
}

export interface EmergencyQuote {
  feeBps: Bps;
  fill: FillResult;
  /** Quote-unit notional of the clamped output */
  notional: Amount;
}

/**
 * (reserveOut − floor) ≤ reserveOut × floorEpsilonBps / 10_000
 */
export function isNearFloor(inventory: InventoryState, isBaseIn: boolean, floorBps: Bps, epsilonBps: Bps): boolean {
  const reserveOut = outputReserve(inventory, isBaseIn);
  const headroom = reserveOut - floorAmount(reserveOut, floorBps);
  return headroom <= bpsOf(reserveOut, epsilonBps);
}

export function emergencyFeeBps(feeBps: Bps, config: EngineConfig): Bps {
  return Math.min(Math.max(feeBps, config.aomq.emergencySpreadBps), config.fee.capBps);
}

/**
 * Build the emergency quote, or undefined when it would fall under minQuoteNotional.
 */
export function emergencyQuote(input: EmergencyQuoteInput): EmergencyQuote | undefined {
  const { amountIn, isBaseIn, mid, inventory, config, tokens } = input;
  const feeBps = emergencyFeeBps(input.feeBps, config);
  const fill = fillExactIn({
    amountIn,
    isBaseIn,
    mid,
    feeBps,
    inventory,
    floorBps: config.inventory.floorBps,
    tokens,
  });

  // Output is base when the trader pays quote
  const notional = tradeNotional(fill.amountOut, !isBaseIn, mid, tokens);
  if (fill.amountOut === 0n || notional < config.aomq.minQuoteNotional) return undefined;
  return { feeBps, fill, notional };
}

export function aomqActivatedEvent(trigger: AomqTrigger, isBaseIn: boolean, quote: EmergencyQuote): EngineEvent {
  return {
    type: "AOMQ_ACTIVATED",
    trigger,
    isBaseIn,
    triggerNotional: quote.notional,
    emergencySpreadBps: quote.feeBps,
  };
}
