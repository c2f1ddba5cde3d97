/**
 * Shared test fixtures for the core engine.
 *
 * Base leg: 18 decimals, quote leg: 6 decimals, mid 25 quote per base.
 */

import { WAD } from "../src/math";
import type { EngineConfig, OracleReadings, OracleSample, PoolState, PoolTokens, PriceWad } from "../src/types";
import { createInitialPoolState } from "../src/swap-engine";

export const BASE = 10n ** 18n;
export const QUOTE = 10n ** 6n;

export const tokens: PoolTokens = {
  base: { decimals: 18, scale: BASE },
  quote: { decimals: 6, scale: QUOTE },
};

/** price × WAD / 100, e.g. priceCents(2510) = 25.10 */
export const priceCents = (cents: bigint): PriceWad => (cents * WAD) / 100n;

export const MID = 25n * WAD;

export const createDefaultConfig = (): EngineConfig => ({
  oracle: {
    maxAgeSec: 60,
    secondaryMaxAgeSec: 60,
    confCapBpsSpot: 100,
    confCapBpsStrict: 50,
    allowEmaFallback: true,
    confWeightSpreadBps: 10_000,
    confWeightSigmaBps: 10_000,
    confWeightSecondaryBps: 10_000,
    sigmaEwmaLambdaBps: 9_000,
    divergenceBps: 100,
    divergenceAcceptBps: 30,
    divergenceSoftBps: 50,
    divergenceHardBps: 75,
    haircutMinBps: 3,
    haircutSlopeBps: 1,
    divergenceHysteresisCount: 3,
  },
  fee: {
    baseBps: 15,
    alphaNumerator: 6,
    alphaDenominator: 10,
    betaInvDevNumerator: 1,
    betaInvDevDenominator: 10,
    capBps: 150,
    decayPctPerBlock: 20,
    gammaSizeLinBps: 0,
    gammaSizeQuadBps: 0,
    sizeFeeCapBps: 0,
    kappaLvrBps: 0,
    lvrFeeCapBps: 0,
  },
  inventory: {
    floorBps: 300,
    recenterThresholdPct: 5,
    recenterCooldownSec: 60,
    recenterRearmCount: 2,
    invTiltBpsPer1pct: 0,
    invTiltMaxBps: 0,
    tiltConfWeightBps: 0,
    tiltSpreadWeightBps: 0,
  },
  maker: {
    s0Notional: 5_000n * QUOTE,
    ttlMs: 1_000,
    alphaBboBps: 0,
    betaFloorBps: 0,
  },
  aomq: {
    minQuoteNotional: 1n * QUOTE,
    emergencySpreadBps: 100,
    floorEpsilonBps: 0,
  },
  preview: {
    maxAgeSec: 30,
    snapshotCooldownSec: 5,
    revertOnStalePreview: true,
    enablePreviewFresh: true,
  },
  rebates: { rebates: {} },
  flags: {
    blendOn: true,
    enableSoftDivergence: true,
    enableSizeFee: false,
    enableBboFloor: false,
    enableInvTilt: false,
    enableAOMQ: false,
    enableRebates: false,
    enableAutoRecenter: false,
    enableLvrFee: false,
  },
});

export const sample = (overrides: Partial<OracleSample> = {}): OracleSample => ({
  status: "ok",
  mid: MID,
  ageSec: 0,
  ...overrides,
});

export const createDefaultReadings = (): OracleReadings => ({
  primary: sample(),
  secondary: sample(),
});

/** 1000 base / 25000 quote, balanced at mid 25 */
export const createDefaultState = (): PoolState =>
  createInitialPoolState({
    baseReserves: 1_000n * BASE,
    quoteReserves: 25_000n * QUOTE,
    baseFeeBps: 15,
  });
