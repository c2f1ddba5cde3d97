/**
 * ParamGate Unit Tests
 *
 * - Struct bounds and cross-struct rules
 * - All-or-nothing governance updates
 */

import { describe, expect, test } from "vitest";

import {
  MAX_FEE_CAP_BPS,
  applyConfigUpdate,
  validateEngineConfig,
  validateFeeConfig,
  validateInventoryConfig,
  validateOracleConfig,
  validateRebateConfig,
} from "../src/param-gate";
import { createDefaultConfig } from "./fixtures";

describe("validateEngineConfig", () => {
  test("should accept the default config", () => {
    const config = createDefaultConfig();
    const result = validateEngineConfig(config);
    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBe(config);
  });

  test("should reject a zero reference notional", () => {
    const config = createDefaultConfig();
    config.maker.s0Notional = 0n;
    const error = validateEngineConfig(config)._unsafeUnwrapErr();
    expect(error).toMatchObject({ type: "INVALID_CONFIG", field: "maker.s0Notional" });
  });

  test("should reject an emergency spread above the fee cap", () => {
    const config = createDefaultConfig();
    config.aomq.emergencySpreadBps = 151;
    const error = validateEngineConfig(config)._unsafeUnwrapErr();
    expect(error).toMatchObject({ type: "INVALID_CONFIG", field: "aomq.emergencySpreadBps" });
  });
});

describe("validateFeeConfig", () => {
  test("should reject a cap above the hard ceiling", () => {
    const fee = { ...createDefaultConfig().fee, capBps: MAX_FEE_CAP_BPS + 1 };
    expect(validateFeeConfig(fee)._unsafeUnwrapErr()).toMatchObject({
      type: "FEE_CAP_TOO_HIGH",
      capBps: 1001,
      maxCapBps: 1000,
    });
  });

  test("should accept a cap exactly at the ceiling", () => {
    const fee = { ...createDefaultConfig().fee, capBps: MAX_FEE_CAP_BPS };
    expect(validateFeeConfig(fee).isOk()).toBe(true);
  });

  test("should reject base above cap", () => {
    const fee = { ...createDefaultConfig().fee, baseBps: 200 };
    expect(validateFeeConfig(fee)._unsafeUnwrapErr()).toMatchObject({
      type: "FEE_BASE_ABOVE_CAP",
      baseBps: 200,
      capBps: 150,
    });
  });

  test("should reject a zero denominator", () => {
    const fee = { ...createDefaultConfig().fee, alphaDenominator: 0 };
    expect(validateFeeConfig(fee)._unsafeUnwrapErr()).toMatchObject({
      type: "INVALID_CONFIG",
      field: "fee.alphaDenominator",
    });
  });

  test("should reject fractional and negative fields before range checks", () => {
    const fractional = { ...createDefaultConfig().fee, baseBps: 1.5 };
    expect(validateFeeConfig(fractional)._unsafeUnwrapErr()).toMatchObject({ field: "fee.baseBps" });

    const negative = { ...createDefaultConfig().fee, decayPctPerBlock: -1 };
    expect(validateFeeConfig(negative)._unsafeUnwrapErr()).toMatchObject({ field: "fee.decayPctPerBlock" });
  });

  test("should reject decay above 100%", () => {
    const fee = { ...createDefaultConfig().fee, decayPctPerBlock: 101 };
    expect(validateFeeConfig(fee)._unsafeUnwrapErr()).toMatchObject({ field: "fee.decayPctPerBlock" });
  });
});

describe("validateOracleConfig", () => {
  test("should require accept < soft < hard", () => {
    const equal = { ...createDefaultConfig().oracle, divergenceAcceptBps: 50 };
    expect(validateOracleConfig(equal)._unsafeUnwrapErr()).toMatchObject({ field: "oracle.divergenceAcceptBps" });

    const inverted = { ...createDefaultConfig().oracle, divergenceSoftBps: 80 };
    expect(validateOracleConfig(inverted)._unsafeUnwrapErr()).toMatchObject({ field: "oracle.divergenceSoftBps" });
  });

  test("should require a hysteresis count of at least one", () => {
    const oracle = { ...createDefaultConfig().oracle, divergenceHysteresisCount: 0 };
    expect(validateOracleConfig(oracle)._unsafeUnwrapErr()).toMatchObject({
      field: "oracle.divergenceHysteresisCount",
    });
  });
});

describe("validateInventoryConfig", () => {
  test("should reject a floor of half the reserves", () => {
    const config = createDefaultConfig();
    const inventory = { ...config.inventory, floorBps: 5_000 };
    expect(validateInventoryConfig(inventory, config.fee)._unsafeUnwrapErr()).toMatchObject({
      field: "inventory.floorBps",
    });
  });

  test("should bound the tilt by the inventory term", () => {
    const config = createDefaultConfig();
    // beta = 1/10 per bps: 10 bps per 1% is the largest tilt allowed (10 * 10 <= 100 * 1)
    const atLimit = { ...config.inventory, invTiltBpsPer1pct: 10 };
    expect(validateInventoryConfig(atLimit, config.fee).isOk()).toBe(true);

    const overLimit = { ...config.inventory, invTiltBpsPer1pct: 11 };
    expect(validateInventoryConfig(overLimit, config.fee)._unsafeUnwrapErr()).toMatchObject({
      type: "INVALID_CONFIG",
      field: "inventory.invTiltBpsPer1pct",
    });
  });
});

describe("validateRebateConfig", () => {
  test("should cap each rebate", () => {
    expect(validateRebateConfig({ rebates: { alice: 25 } }).isOk()).toBe(true);
    expect(validateRebateConfig({ rebates: { alice: 26 } })._unsafeUnwrapErr()).toMatchObject({
      field: "rebates.alice",
    });
  });
});

describe("applyConfigUpdate", () => {
  test("should replace only the targeted struct", () => {
    const current = createDefaultConfig();
    const fee = { ...current.fee, baseBps: 20 };

    const next = applyConfigUpdate(current, { kind: "fee", config: fee })._unsafeUnwrap();

    expect(next.fee.baseBps).toBe(20);
    expect(next.oracle).toBe(current.oracle);
    expect(current.fee.baseBps).toBe(15);
  });

  test("should leave the prior config intact on failure", () => {
    const current = createDefaultConfig();
    const before = structuredClone(current);

    const result = applyConfigUpdate(current, { kind: "fee", config: { ...current.fee, capBps: 10 } });

    expect(result._unsafeUnwrapErr().type).toBe("FEE_BASE_ABOVE_CAP");
    expect(current).toEqual(before);
  });

  test("should re-run cross-struct checks when the other side changes", () => {
    const current = createDefaultConfig();
    current.inventory.invTiltBpsPer1pct = 10;
    // Raising the beta denominator shrinks the inventory term below the tilt
    const fee = { ...current.fee, betaInvDevDenominator: 20 };

    const error = applyConfigUpdate(current, { kind: "fee", config: fee })._unsafeUnwrapErr();

    expect(error).toMatchObject({ field: "inventory.invTiltBpsPer1pct" });
  });
});
