/**
 * Core Domain Types
 *
 * Pure type definitions for the pricing engine.
 * No I/O dependencies, no side effects.
 *
 * Units:
 * - Token amounts are bigint in the token's smallest unit
 * - Prices are bigint WAD (1e18) quote-per-base prices in human units
 * - Basis points are integer numbers (1 bps = 1/10_000)
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** WAD-scaled price (1e18 = 1.0 quote per base) */
export type PriceWad = bigint;

/** Token amount in the token's smallest unit */
export type Amount = bigint;

/** Basis points (integer) */
export type Bps = number;

/** Unix seconds */
export type Sec = number;

/** Block number or logical tick used for fee decay and EWMA bookkeeping */
export type Tick = number;

/**
 * Static description of one token leg.
 * Read once from the host and cached.
 */
export interface TokenLegInfo {
  decimals: number;
  /** 10 ** decimals */
  scale: bigint;
}

export interface PoolTokens {
  base: TokenLegInfo;
  quote: TokenLegInfo;
}

// ─────────────────────────────────────────────────────────────────────────────
// Oracle Inputs
// ─────────────────────────────────────────────────────────────────────────────

export type OracleStatus = "ok" | "stale" | "error";

/**
 * One reading from one oracle source, as delivered by the transport layer.
 */
export interface OracleSample {
  status: OracleStatus;
  mid?: PriceWad;
  bid?: PriceWad;
  ask?: PriceWad;
  confidenceBps?: Bps;
  ageSec: Sec;
  /** Transport detail for failed reads (timeout, revert message, ...) */
  detail?: string;
}

/**
 * All readings consumed by a single fusion call.
 *
 * - primary: fast-updating source (mid, optional bid/ask)
 * - ema: the primary's EMA reading, used as first fallback
 * - secondary: independent source (derived mid + confidence)
 */
export interface OracleReadings {
  primary: OracleSample;
  ema?: OracleSample;
  secondary?: OracleSample;
}

/**
 * Oracle mode requested by the caller
 * - spot: confidence is capped at confCapBpsSpot
 * - strict: confidence above confCapBpsStrict rejects the request
 */
export type OracleMode = "spot" | "strict";

export type OracleSourceReason = "PRIMARY" | "EMA_FALLBACK" | "SECONDARY_FALLBACK";

/**
 * Fused view of both oracle sources. Recomputed every request, never persisted.
 */
export interface FusedQuote {
  midUsed: PriceWad;
  usedFallback: boolean;
  sourceReason: OracleSourceReason;
  /** Disagreement between the used mid and the secondary; absent when no comparison is possible */
  deltaBps?: Bps;
  /** Blended confidence: max of the weighted, capped components */
  confidenceBps: Bps;
  /** Primary bid/ask spread when observable */
  spreadBps?: Bps;
  confSpreadBps: Bps;
  confSigmaBps: Bps;
  confSecondaryBps: Bps;
}

// ─────────────────────────────────────────────────────────────────────────────
// Persisted State
// ─────────────────────────────────────────────────────────────────────────────

export interface DivergenceState {
  active: boolean;
  lastDeltaBps: Bps;
  healthyStreak: number;
}

export interface FeeState {
  lastFeeBps: Bps;
  lastTick: Tick;
}

/**
 * Volatility EWMA over fused mid moves, in bps per observation.
 */
export interface SigmaState {
  sigmaBps: Bps;
  lastMid: PriceWad;
  lastTick: Tick;
}

export interface InventoryState {
  baseReserves: Amount;
  quoteReserves: Amount;
  targetBaseStar: Amount;
  lastRebalancePrice: PriceWad;
  lastRebalanceAt: Sec;
}

/**
 * Auto-recenter arming state.
 * After a commit the machine is disarmed until enough healthy observations arrive.
 */
export interface RecenterState {
  armed: boolean;
  healthyStreak: number;
}

/**
 * Cached oracle view served to preview calls.
 * Created on refresh, read many times, never mutated in place.
 */
export interface PreviewSnapshot {
  timestamp: Sec;
  midUsed: PriceWad;
  sigmaBps: Bps;
  confBps: Bps;
  divergenceBps: Bps;
  spreadBps?: Bps;
}

/**
 * Aggregate of everything the engine persists between calls.
 */
export interface PoolState {
  fee: FeeState;
  divergence: DivergenceState;
  sigma: SigmaState;
  inventory: InventoryState;
  recenter: RecenterState;
  preview?: PreviewSnapshot;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration (validated value structs, see param-gate.ts)
// ─────────────────────────────────────────────────────────────────────────────

export interface OracleConfig {
  maxAgeSec: Sec;
  secondaryMaxAgeSec: Sec;
  confCapBpsSpot: Bps;
  confCapBpsStrict: Bps;
  allowEmaFallback: boolean;
  confWeightSpreadBps: Bps;
  confWeightSigmaBps: Bps;
  confWeightSecondaryBps: Bps;
  sigmaEwmaLambdaBps: Bps;
  /** Single-threshold check used when soft divergence is disabled */
  divergenceBps: Bps;
  divergenceAcceptBps: Bps;
  divergenceSoftBps: Bps;
  divergenceHardBps: Bps;
  haircutMinBps: Bps;
  haircutSlopeBps: Bps;
  /** Consecutive healthy samples needed to clear an active divergence */
  divergenceHysteresisCount: number;
}

export interface FeeConfig {
  baseBps: Bps;
  alphaNumerator: number;
  alphaDenominator: number;
  betaInvDevNumerator: number;
  betaInvDevDenominator: number;
  capBps: Bps;
  decayPctPerBlock: number;
  gammaSizeLinBps: Bps;
  gammaSizeQuadBps: Bps;
  sizeFeeCapBps: Bps;
  kappaLvrBps: Bps;
  lvrFeeCapBps: Bps;
}

export interface InventoryConfig {
  floorBps: Bps;
  recenterThresholdPct: number;
  recenterCooldownSec: Sec;
  recenterRearmCount: number;
  invTiltBpsPer1pct: Bps;
  invTiltMaxBps: Bps;
  tiltConfWeightBps: Bps;
  tiltSpreadWeightBps: Bps;
}

export interface MakerConfig {
  /** Reference trade notional in quote units */
  s0Notional: Amount;
  ttlMs: number;
  alphaBboBps: Bps;
  betaFloorBps: Bps;
}

export interface AomqConfig {
  /** Smallest quote notional (quote units) an emergency quote may carry */
  minQuoteNotional: Amount;
  emergencySpreadBps: Bps;
  floorEpsilonBps: Bps;
}

export interface PreviewConfig {
  maxAgeSec: Sec;
  snapshotCooldownSec: Sec;
  revertOnStalePreview: boolean;
  enablePreviewFresh: boolean;
}

export interface RebateConfig {
  /** Per-caller discount in bps */
  rebates: Record<string, Bps>;
}

export interface FeatureFlags {
  blendOn: boolean;
  enableSoftDivergence: boolean;
  enableSizeFee: boolean;
  enableBboFloor: boolean;
  enableInvTilt: boolean;
  enableAOMQ: boolean;
  enableRebates: boolean;
  enableAutoRecenter: boolean;
  enableLvrFee: boolean;
}

export interface EngineConfig {
  oracle: OracleConfig;
  fee: FeeConfig;
  inventory: InventoryConfig;
  maker: MakerConfig;
  aomq: AomqConfig;
  preview: PreviewConfig;
  rebates: RebateConfig;
  flags: FeatureFlags;
}

/**
 * A governance update targets exactly one struct.
 */
export type ConfigUpdate =
  | { kind: "oracle"; config: OracleConfig }
  | { kind: "fee"; config: FeeConfig }
  | { kind: "inventory"; config: InventoryConfig }
  | { kind: "maker"; config: MakerConfig }
  | { kind: "aomq"; config: AomqConfig }
  | { kind: "preview"; config: PreviewConfig }
  | { kind: "rebates"; config: RebateConfig }
  | { kind: "flags"; config: FeatureFlags };

// ─────────────────────────────────────────────────────────────────────────────
// Quote Output
// ─────────────────────────────────────────────────────────────────────────────

export type QuoteReason = "OK" | "FLOOR" | "AOMQ_CLAMP";

export type ClampFlag =
  | "FLOOR"
  | "AOMQ"
  | "FALLBACK"
  | "SIZE_FEE"
  | "INV_TILT"
  | "FEE_CAP"
  | "BBO_FLOOR"
  | "DIVERGENCE_HAIRCUT"
  | "REBATE";

/**
 * Result of a quote or swap. Ephemeral, returned per call.
 */
export interface QuoteResult {
  amountIn: Amount;
  amountOut: Amount;
  midUsed: PriceWad;
  feeBpsUsed: Bps;
  /** Amount of input actually consumed; equals amountIn on a full fill */
  partialFillAmountIn: Amount;
  usedFallback: boolean;
  reason: QuoteReason;
  /** De-duplicated, in the order the clamps were applied */
  clampFlags: ClampFlag[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Engine Events (for telemetry collaborators)
// ─────────────────────────────────────────────────────────────────────────────

export type AomqTrigger = "SOFT_DIVERGENCE" | "CONF_CAP" | "NEAR_FLOOR";

export type RecenterTrigger = "manual" | "auto";

export type EngineEvent =
  | { type: "DIVERGENCE_HAIRCUT"; deltaBps: Bps; haircutBps: Bps; softBand: boolean }
  | { type: "DIVERGENCE_REJECTED"; deltaBps: Bps; hardBps: Bps }
  | { type: "DIVERGENCE_CLEARED"; deltaBps: Bps; healthyStreak: number }
  | {
      type: "AOMQ_ACTIVATED";
      trigger: AomqTrigger;
      isBaseIn: boolean;
      /** Quote notional of the clamped emergency quote */
      triggerNotional: Amount;
      emergencySpreadBps: Bps;
    }
  | {
      type: "RECENTER_COMMITTED";
      trigger: RecenterTrigger;
      price: PriceWad;
      previousTarget: Amount;
      newTarget: Amount;
      deviationBps: Bps;
    }
  | {
      type: "PREVIEW_SNAPSHOT_REFRESHED";
      timestamp: Sec;
      midUsed: PriceWad;
      confBps: Bps;
      divergenceBps: Bps;
    };

export type EngineEventType = EngineEvent["type"];

// ─────────────────────────────────────────────────────────────────────────────
// Swap Evaluation Input/Output
// ─────────────────────────────────────────────────────────────────────────────

export interface SwapInput {
  state: PoolState;
  config: EngineConfig;
  tokens: PoolTokens;
  amountIn: Amount;
  isBaseIn: boolean;
  mode: OracleMode;
  readings: OracleReadings;
  nowSec: Sec;
  tick: Tick;
  /** Caller identity used for rebates */
  caller?: string;
}

export interface SwapOutput {
  result: QuoteResult;
  nextState: PoolState;
  events: EngineEvent[];
}
