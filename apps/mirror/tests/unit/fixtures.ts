/**
 * Mirror test fixtures: 1000 base / 25000 quote at mid 25, base fee 15 bps.
 */

import {
  WAD,
  createInitialPoolState,
  type EngineConfig,
  type OracleReadings,
  type OracleSample,
  type PoolState,
  type PoolTokens,
  type PriceWad,
} from "@dnmm/core";

export const BASE = 10n ** 18n;
export const QUOTE = 10n ** 6n;
export const MID = 25n * WAD;

export const tokens: PoolTokens = {
  base: { decimals: 18, scale: BASE },
  quote: { decimals: 6, scale: QUOTE },
};

export const priceCents = (cents: bigint): PriceWad => (cents * WAD) / 100n;

export const sample = (overrides: Partial<OracleSample> = {}): OracleSample => ({
  status: "ok",
  mid: MID,
  ageSec: 0,
  ...overrides,
});

export const readingsWithSecondary = (cents = 2500n): OracleReadings => ({
  primary: sample(),
  secondary: sample({ mid: priceCents(cents) }),
});

export const createState = (): PoolState =>
  createInitialPoolState({ baseReserves: 1_000n * BASE, quoteReserves: 25_000n * QUOTE, baseFeeBps: 15 });

export const createConfig = (): EngineConfig => ({
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
  maker: { s0Notional: 5_000n * QUOTE, ttlMs: 1_000, alphaBboBps: 0, betaFloorBps: 0 },
  aomq: { minQuoteNotional: QUOTE, emergencySpreadBps: 100, floorEpsilonBps: 0 },
  preview: { maxAgeSec: 30, snapshotCooldownSec: 5, revertOnStalePreview: true, enablePreviewFresh: true },
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
