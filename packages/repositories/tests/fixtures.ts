import { createInitialPoolState, type EngineConfig, type PoolState } from "@dnmm/core";

const WAD = 10n ** 18n;

export const createTestState = (): PoolState => ({
  ...createInitialPoolState({
    baseReserves: 1_000n * WAD,
    quoteReserves: 25_000_000_000n,
    baseFeeBps: 15,
  }),
  preview: { timestamp: 1_000, midUsed: 25n * WAD, sigmaBps: 4, confBps: 12, divergenceBps: 0 },
});

export const createTestConfig = (): EngineConfig => ({
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
  maker: { s0Notional: 5_000_000_000n, ttlMs: 1_000, alphaBboBps: 0, betaFloorBps: 0 },
  aomq: { minQuoteNotional: 1_000_000n, emergencySpreadBps: 100, floorEpsilonBps: 0 },
  preview: { maxAgeSec: 30, snapshotCooldownSec: 5, revertOnStalePreview: true, enablePreviewFresh: true },
  rebates: { rebates: { "0xabc": 5 } },
  flags: {
    blendOn: true,
    enableSoftDivergence: true,
    enableSizeFee: false,
    enableBboFloor: false,
    enableInvTilt: false,
    enableAOMQ: true,
    enableRebates: true,
    enableAutoRecenter: false,
    enableLvrFee: false,
  },
});
