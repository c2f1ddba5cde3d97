/**
 * Inventory Engine Unit Tests
 *
 * - Floor exactness in both directions
 * - Symmetric deviation and trade direction
 */

import { describe, expect, test } from "vitest";

import {
  applyFill,
  fillExactIn,
  floorAmount,
  inventoryDeviationBps,
  tradeDirection,
  type FillInput,
} from "../src/inventory";
import type { InventoryState } from "../src/types";
import { BASE, MID, QUOTE, tokens } from "./fixtures";

const createDefaultInventory = (): InventoryState => ({
  baseReserves: 1_000n * BASE,
  quoteReserves: 25_000n * QUOTE,
  targetBaseStar: 1_000n * BASE,
  lastRebalancePrice: MID,
  lastRebalanceAt: 0,
});

const fillInput = (overrides: Partial<FillInput>): FillInput => ({
  amountIn: 0n,
  isBaseIn: true,
  mid: MID,
  feeBps: 30,
  inventory: createDefaultInventory(),
  floorBps: 300,
  tokens,
  ...overrides,
});

describe("floorAmount", () => {
  test("should floor reserve × floorBps", () => {
    expect(floorAmount(25_000n * QUOTE, 300)).toBe(750n * QUOTE);
    expect(floorAmount(999n, 300)).toBe(29n);
  });
});

describe("inventoryDeviationBps", () => {
  test("should be zero at target", () => {
    expect(inventoryDeviationBps(createDefaultInventory(), MID, tokens)).toBe(0);
  });

  test("should be symmetric in which side is heavy", () => {
    // 30000 vs 25000 target over 50000 total
    const baseHeavy = { ...createDefaultInventory(), baseReserves: 1_200n * BASE, quoteReserves: 20_000n * QUOTE };
    // 20000 vs 25000 target over 50000 total
    const quoteHeavy = { ...createDefaultInventory(), baseReserves: 800n * BASE, quoteReserves: 30_000n * QUOTE };

    expect(inventoryDeviationBps(baseHeavy, MID, tokens)).toBe(1_000);
    expect(inventoryDeviationBps(quoteHeavy, MID, tokens)).toBe(1_000);
  });

  test("should be zero for an empty pool", () => {
    const empty = { ...createDefaultInventory(), baseReserves: 0n, quoteReserves: 0n };
    expect(inventoryDeviationBps(empty, MID, tokens)).toBe(0);
  });
});

describe("tradeDirection", () => {
  test("should classify trades against the heavy side", () => {
    const baseHeavy = { ...createDefaultInventory(), baseReserves: 1_200n * BASE };
    expect(tradeDirection(baseHeavy, true)).toBe("WORSENS");
    expect(tradeDirection(baseHeavy, false)).toBe("RESTORES");

    const baseLight = { ...createDefaultInventory(), baseReserves: 800n * BASE };
    expect(tradeDirection(baseLight, true)).toBe("RESTORES");
    expect(tradeDirection(baseLight, false)).toBe("WORSENS");

    expect(tradeDirection(createDefaultInventory(), true)).toBe("NEUTRAL");
  });
});

describe("fillExactIn", () => {
  test("should take the fee on the output of a full fill", () => {
    // 10 base * 25 = 250 quote, less 30 bps
    const fill = fillExactIn(fillInput({ amountIn: 10n * BASE }));

    expect(fill).toEqual({
      amountOut: 249_250_000n,
      amountInUsed: 10n * BASE,
      partial: false,
      floor: 750n * QUOTE,
    });
  });

  test("should leave the quote reserve exactly on the floor for base-in", () => {
    const inventory = createDefaultInventory();
    const fill = fillExactIn(fillInput({ amountIn: 2_000n * BASE, inventory }));

    expect(fill.partial).toBe(true);
    expect(fill.amountOut).toBe(24_250n * QUOTE);
    // ceil(ceil(24250e6 * 10000 / 9970) * 1e12 / 25)
    expect(fill.amountInUsed).toBe(972_918_756_280_000_000_000n);
    expect(fill.amountInUsed).toBeLessThan(2_000n * BASE);

    const after = applyFill(inventory, true, fill);
    expect(after.quoteReserves).toBe(floorAmount(inventory.quoteReserves, 300));
    expect(after.baseReserves).toBe(inventory.baseReserves + fill.amountInUsed);
  });

  test("should leave the base reserve exactly on the floor for quote-in", () => {
    const inventory = createDefaultInventory();
    const fill = fillExactIn(fillInput({ amountIn: 30_000n * QUOTE, isBaseIn: false, feeBps: 0, inventory }));

    // 30000 / 25 = 1200 base wanted, 970 available above the 30 base floor
    expect(fill.partial).toBe(true);
    expect(fill.amountOut).toBe(970n * BASE);
    expect(fill.amountInUsed).toBe(24_250n * QUOTE);

    const after = applyFill(inventory, false, fill);
    expect(after.baseReserves).toBe(floorAmount(inventory.baseReserves, 300));
    expect(after.quoteReserves).toBe(49_250n * QUOTE);
  });

  test("should land exactly on the floor across reserves, sizes and mids", () => {
    const mids = [MID, 3n * 10n ** 17n, 123_456_789n * 10n ** 12n];
    const sizes = [1n, 7n, 3_333n];
    for (const mid of mids) {
      for (const size of sizes) {
        for (const isBaseIn of [true, false]) {
          const inventory = {
            ...createDefaultInventory(),
            baseReserves: 37n * BASE + 17n,
            quoteReserves: 911n * QUOTE + 3n,
          };
          const amountIn = isBaseIn ? size * 1_000n * BASE : size * 1_000_000n * QUOTE;
          const fill = fillExactIn(fillInput({ amountIn, isBaseIn, mid, feeBps: 45, inventory }));
          const reserveOut = isBaseIn ? inventory.quoteReserves : inventory.baseReserves;
          const after = applyFill(inventory, isBaseIn, fill);
          const postOut = isBaseIn ? after.quoteReserves : after.baseReserves;

          expect(postOut).toBeGreaterThanOrEqual(floorAmount(reserveOut, 300));
          if (fill.partial) {
            expect(postOut).toBe(floorAmount(reserveOut, 300));
            expect(fill.amountInUsed).toBeLessThanOrEqual(amountIn);
          }
        }
      }
    }
  });
});
