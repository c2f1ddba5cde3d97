/**
 * Fixed-Point Math - bigint helpers shared by every pricing component
 *
 * - Floor and ceil scaled multiply/divide
 * - Basis point conversions
 * - Base/quote conversion at a WAD mid with explicit rounding
 *
 * This module is pure (no I/O, no throw on valid inputs).
 * Callers guarantee non-zero divisors.
 */

import type { Amount, Bps, PoolTokens, PriceWad } from "./types";

export const WAD = 10n ** 18n;
export const BPS = 10_000n;
export const BPS_NUM = 10_000;

export type Rounding = "down" | "up";

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return (a * b) / denominator;
}

export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  const product = a * b;
  if (product === 0n) return 0n;
  return (product - 1n) / denominator + 1n;
}

export function ceilDiv(a: bigint, b: bigint): bigint {
  if (a === 0n) return 0n;
  return (a - 1n) / b + 1n;
}

/** floor(amount × bps / 10_000) */
export function bpsOf(amount: bigint, bps: Bps): bigint {
  return (amount * BigInt(bps)) / BPS;
}

/** floor(numerator × 10_000 / denominator) as a number; 0 when denominator is 0 */
export function toBps(numerator: bigint, denominator: bigint): Bps {
  if (denominator === 0n) return 0;
  return Number((numerator * BPS) / denominator);
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

export function minBig(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBig(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(Math.max(value, lo), hi);
}

/** Integer square root (floor) via Newton iteration */
export function sqrt(value: bigint): bigint {
  if (value < 2n) return value < 0n ? 0n : value;
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

/**
 * Symmetric disagreement between two prices in bps, relative to the smaller one.
 */
export function deltaBpsBetween(a: PriceWad, b: PriceWad): Bps {
  const lo = minBig(a, b);
  if (lo === 0n) return 0;
  return toBps(absDiff(a, b), lo);
}

/**
 * amountBase × mid × quoteScale / (WAD × baseScale)
 */
export function baseToQuote(amountBase: Amount, mid: PriceWad, tokens: PoolTokens, rounding: Rounding = "down"): Amount {
  const numerator = amountBase * mid * tokens.quote.scale;
  const denominator = WAD * tokens.base.scale;
  return rounding === "up" ? ceilDiv(numerator, denominator) : numerator / denominator;
}

/**
 * amountQuote × WAD × baseScale / (mid × quoteScale)
 */
export function quoteToBase(amountQuote: Amount, mid: PriceWad, tokens: PoolTokens, rounding: Rounding = "down"): Amount {
  const numerator = amountQuote * WAD * tokens.base.scale;
  const denominator = mid * tokens.quote.scale;
  return rounding === "up" ? ceilDiv(numerator, denominator) : numerator / denominator;
}
