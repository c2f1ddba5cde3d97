/**
 * ParamGate - Governance config validation
 *
 * - Every config struct is a plain value validated by one function
 * - Invalid combinations are rejected at construction, not at use
 * - Updates are all-or-nothing: the whole candidate config is re-validated
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { invalidConfig, type ConfigError } from "./errors";
import type {
  AomqConfig,
  ConfigUpdate,
  EngineConfig,
  FeeConfig,
  InventoryConfig,
  MakerConfig,
  OracleConfig,
  PreviewConfig,
  RebateConfig,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Hard ceiling for capBps (10%) */
export const MAX_FEE_CAP_BPS = 1_000;

/** Hard ceiling for a single caller rebate */
export const MAX_REBATE_BPS = 25;

const MAX_BPS = 10_000;

/** Inventory floor must leave more than half of each reserve tradable */
const MAX_FLOOR_BPS = 5_000;

type Check = Result<void, ConfigError>;

// ─────────────────────────────────────────────────────────────────────────────
// Field helpers
// ─────────────────────────────────────────────────────────────────────────────

function nonNegativeInt(field: string, value: number): Check {
  if (!Number.isSafeInteger(value) || value < 0) {
    return err(invalidConfig(field, `must be a non-negative integer, got ${value}`));
  }
  return ok(undefined);
}

function positiveInt(field: string, value: number): Check {
  if (!Number.isSafeInteger(value) || value <= 0) {
    return err(invalidConfig(field, `must be a positive integer, got ${value}`));
  }
  return ok(undefined);
}

function atMost(field: string, value: number, max: number, maxName: string): Check {
  if (value > max) {
    return err(invalidConfig(field, `must be <= ${maxName} (${max}), got ${value}`));
  }
  return ok(undefined);
}

/** Runs checks in order and stops at the first failure */
function firstFailure(checks: Array<() => Check>): Check {
  for (const check of checks) {
    const result = check();
    if (result.isErr()) return result;
  }
  return ok(undefined);
}

function allNonNegativeInts(prefix: string, fields: Record<string, number>): Check {
  return firstFailure(Object.entries(fields).map(([key, value]) => () => nonNegativeInt(`${prefix}.${key}`, value)));
}

// ─────────────────────────────────────────────────────────────────────────────
// Struct validators
// ─────────────────────────────────────────────────────────────────────────────

export function validateFeeConfig(fee: FeeConfig): Result<FeeConfig, ConfigError> {
  const fields = allNonNegativeInts("fee", { ...fee });
  if (fields.isErr()) return err(fields.error);

  if (fee.capBps > MAX_FEE_CAP_BPS) {
    return err({
      type: "FEE_CAP_TOO_HIGH",
      capBps: fee.capBps,
      maxCapBps: MAX_FEE_CAP_BPS,
      message: `Fee cap ${fee.capBps} bps exceeds ${MAX_FEE_CAP_BPS} bps`,
    });
  }
  if (fee.baseBps > fee.capBps) {
    return err({
      type: "FEE_BASE_ABOVE_CAP",
      baseBps: fee.baseBps,
      capBps: fee.capBps,
      message: `Fee base ${fee.baseBps} bps is above cap ${fee.capBps} bps`,
    });
  }

  return firstFailure([
    () => positiveInt("fee.alphaDenominator", fee.alphaDenominator),
    () => positiveInt("fee.betaInvDevDenominator", fee.betaInvDevDenominator),
    () => atMost("fee.decayPctPerBlock", fee.decayPctPerBlock, 100, "100"),
    () => atMost("fee.sizeFeeCapBps", fee.sizeFeeCapBps, fee.capBps, "capBps"),
    () => atMost("fee.lvrFeeCapBps", fee.lvrFeeCapBps, fee.capBps, "capBps"),
  ]).map(() => fee);
}

export function validateOracleConfig(oracle: OracleConfig): Result<OracleConfig, ConfigError> {
  const { allowEmaFallback: _allowEmaFallback, ...numeric } = oracle;
  const fields = allNonNegativeInts("oracle", numeric);
  if (fields.isErr()) return err(fields.error);

  return firstFailure([
    () => positiveInt("oracle.maxAgeSec", oracle.maxAgeSec),
    () => positiveInt("oracle.secondaryMaxAgeSec", oracle.secondaryMaxAgeSec),
    () => atMost("oracle.confCapBpsSpot", oracle.confCapBpsSpot, MAX_BPS, "10000"),
    () => atMost("oracle.confCapBpsStrict", oracle.confCapBpsStrict, MAX_BPS, "10000"),
    () => atMost("oracle.sigmaEwmaLambdaBps", oracle.sigmaEwmaLambdaBps, MAX_BPS, "10000"),
    () => atMost("oracle.divergenceAcceptBps", oracle.divergenceAcceptBps, oracle.divergenceSoftBps - 1, "divergenceSoftBps - 1"),
    () => atMost("oracle.divergenceSoftBps", oracle.divergenceSoftBps, oracle.divergenceHardBps - 1, "divergenceHardBps - 1"),
    () => positiveInt("oracle.divergenceHysteresisCount", oracle.divergenceHysteresisCount),
  ]).map(() => oracle);
}

/**
 * The fee struct is needed for the tilt cross-check: the restoring-side
 * discount per 1% of deviation may not exceed the inventory term it offsets.
 */
export function validateInventoryConfig(
  inventory: InventoryConfig,
  fee: FeeConfig,
): Result<InventoryConfig, ConfigError> {
  const fields = allNonNegativeInts("inventory", { ...inventory });
  if (fields.isErr()) return err(fields.error);

  const tiltLhs = inventory.invTiltBpsPer1pct * fee.betaInvDevDenominator;
  const tiltRhs = 100 * fee.betaInvDevNumerator;

  return firstFailure([
    () => atMost("inventory.floorBps", inventory.floorBps, MAX_FLOOR_BPS - 1, "4999"),
    () => positiveInt("inventory.recenterThresholdPct", inventory.recenterThresholdPct),
    () => atMost("inventory.recenterThresholdPct", inventory.recenterThresholdPct, 100, "100"),
    () => atMost("inventory.invTiltMaxBps", inventory.invTiltMaxBps, MAX_BPS, "10000"),
    () =>
      tiltLhs > tiltRhs
        ? err(
            invalidConfig(
              "inventory.invTiltBpsPer1pct",
              `tilt ${inventory.invTiltBpsPer1pct} bps per 1% exceeds inventory term ${fee.betaInvDevNumerator}/${fee.betaInvDevDenominator} per bps`,
            ),
          )
        : ok(undefined),
  ]).map(() => inventory);
}

export function validateMakerConfig(maker: MakerConfig, fee: FeeConfig): Result<MakerConfig, ConfigError> {
  if (maker.s0Notional <= 0n) {
    return err(invalidConfig("maker.s0Notional", "must be positive"));
  }
  return firstFailure([
    () => nonNegativeInt("maker.ttlMs", maker.ttlMs),
    () => nonNegativeInt("maker.alphaBboBps", maker.alphaBboBps),
    () => nonNegativeInt("maker.betaFloorBps", maker.betaFloorBps),
    () => atMost("maker.alphaBboBps", maker.alphaBboBps, MAX_BPS, "10000"),
    () => atMost("maker.betaFloorBps", maker.betaFloorBps, fee.capBps, "capBps"),
  ]).map(() => maker);
}

export function validateAomqConfig(aomq: AomqConfig, fee: FeeConfig): Result<AomqConfig, ConfigError> {
  if (aomq.minQuoteNotional < 0n) {
    return err(invalidConfig("aomq.minQuoteNotional", "must be non-negative"));
  }
  return firstFailure([
    () => nonNegativeInt("aomq.emergencySpreadBps", aomq.emergencySpreadBps),
    () => nonNegativeInt("aomq.floorEpsilonBps", aomq.floorEpsilonBps),
    () => atMost("aomq.emergencySpreadBps", aomq.emergencySpreadBps, fee.capBps, "capBps"),
    () => atMost("aomq.floorEpsilonBps", aomq.floorEpsilonBps, MAX_BPS, "10000"),
  ]).map(() => aomq);
}

export function validatePreviewConfig(preview: PreviewConfig): Result<PreviewConfig, ConfigError> {
  return firstFailure([
    () => positiveInt("preview.maxAgeSec", preview.maxAgeSec),
    () => nonNegativeInt("preview.snapshotCooldownSec", preview.snapshotCooldownSec),
  ]).map(() => preview);
}

export function validateRebateConfig(rebates: RebateConfig): Result<RebateConfig, ConfigError> {
  return firstFailure(
    Object.entries(rebates.rebates).flatMap(([caller, bps]) => [
      () => nonNegativeInt(`rebates.${caller}`, bps),
      () => atMost(`rebates.${caller}`, bps, MAX_REBATE_BPS, "MAX_REBATE_BPS"),
    ]),
  ).map(() => rebates);
}

/**
 * Validate a complete engine config, including cross-struct rules.
 */
export function validateEngineConfig(config: EngineConfig): Result<EngineConfig, ConfigError> {
  return validateFeeConfig(config.fee)
    .andThen(() => validateOracleConfig(config.oracle))
    .andThen(() => validateInventoryConfig(config.inventory, config.fee))
    .andThen(() => validateMakerConfig(config.maker, config.fee))
    .andThen(() => validateAomqConfig(config.aomq, config.fee))
    .andThen(() => validatePreviewConfig(config.preview))
    .andThen(() => validateRebateConfig(config.rebates))
    .map(() => config);
}

/**
 * Apply one governance update. On failure the caller keeps `current`,
 * which is never modified.
 */
export function applyConfigUpdate(current: EngineConfig, update: ConfigUpdate): Result<EngineConfig, ConfigError> {
  return validateEngineConfig(withUpdate(current, update));
}

function withUpdate(current: EngineConfig, update: ConfigUpdate): EngineConfig {
  switch (update.kind) {
    case "oracle":
      return { ...current, oracle: update.config };
    case "fee":
      return { ...current, fee: update.config };
    case "inventory":
      return { ...current, inventory: update.config };
    case "maker":
      return { ...current, maker: update.config };
    case "aomq":
      return { ...current, aomq: update.config };
    case "preview":
      return { ...current, preview: update.config };
    case "rebates":
      return { ...current, rebates: update.config };
    case "flags":
      return { ...current, flags: update.config };
  }
}
