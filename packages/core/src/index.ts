/**
 * packages/core - Pure Pricing Engine
 *
 * Oracle fusion, divergence gate, fee curve, inventory fills, recenter,
 * AOMQ and preview logic for an oracle-anchored two-asset pool.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (returns neverthrow Results).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  PriceWad,
  Amount,
  Bps,
  Sec,
  Tick,
  TokenLegInfo,
  PoolTokens,
  // Oracle
  OracleStatus,
  OracleSample,
  OracleReadings,
  OracleMode,
  OracleSourceReason,
  FusedQuote,
  // State
  DivergenceState,
  FeeState,
  SigmaState,
  InventoryState,
  RecenterState,
  PreviewSnapshot,
  PoolState,
  // Config
  OracleConfig,
  FeeConfig,
  InventoryConfig,
  MakerConfig,
  AomqConfig,
  PreviewConfig,
  RebateConfig,
  FeatureFlags,
  EngineConfig,
  ConfigUpdate,
  // Output
  QuoteReason,
  ClampFlag,
  QuoteResult,
  AomqTrigger,
  RecenterTrigger,
  EngineEvent,
  EngineEventType,
  SwapInput,
  SwapOutput,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export type {
  OracleSourceName,
  OracleError,
  DivergenceError,
  PreviewError,
  RecenterError,
  ConfigError,
  SwapError,
  EngineError,
  EngineErrorType,
} from "./errors";

// ─────────────────────────────────────────────────────────────────────────────
// Fixed-Point Math
// ─────────────────────────────────────────────────────────────────────────────
export type { Rounding } from "./math";
export {
  WAD,
  BPS,
  mulDiv,
  mulDivUp,
  ceilDiv,
  bpsOf,
  toBps,
  absDiff,
  minBig,
  maxBig,
  clamp,
  sqrt,
  deltaBpsBetween,
  baseToQuote,
  quoteToBase,
} from "./math";

// ─────────────────────────────────────────────────────────────────────────────
// ParamGate
// ─────────────────────────────────────────────────────────────────────────────
export {
  MAX_FEE_CAP_BPS,
  MAX_REBATE_BPS,
  validateFeeConfig,
  validateOracleConfig,
  validateInventoryConfig,
  validateMakerConfig,
  validateAomqConfig,
  validatePreviewConfig,
  validateRebateConfig,
  validateEngineConfig,
  applyConfigUpdate,
} from "./param-gate";

// ─────────────────────────────────────────────────────────────────────────────
// Oracle Fusion & Divergence
// ─────────────────────────────────────────────────────────────────────────────
export { fuseOracle, enforceConfidenceCap, updateSigma, isFresh, sampleSpreadBps } from "./oracle-fusion";
export type { DivergenceOutcome } from "./divergence";
export { evaluateDivergence, haircutFor, createInitialDivergenceState } from "./divergence";

// ─────────────────────────────────────────────────────────────────────────────
// Fee Curve
// ─────────────────────────────────────────────────────────────────────────────
export type { FeeSignals, FeeTerms, FeeComputation } from "./fee-curve";
export {
  computeFee,
  confidenceTerm,
  inventoryTerm,
  sizeTerm,
  lvrTerm,
  bboFloorBps,
  decayFee,
  applyRebate,
} from "./fee-curve";

// ─────────────────────────────────────────────────────────────────────────────
// Inventory, Recenter & AOMQ
// ─────────────────────────────────────────────────────────────────────────────
export type { TradeDirection, FillInput, FillResult } from "./inventory";
export {
  floorAmount,
  outputReserve,
  inventoryDeviationBps,
  tradeDirection,
  fillExactIn,
  applyFill,
  tradeNotional,
} from "./inventory";
export type { RecenterContext, RecenterOutcome } from "./recenter";
export {
  createInitialRecenterState,
  priceDeviationBps,
  recenterThresholdBps,
  cooldownRemainingSec,
  fiftyFiftyTarget,
  manualRecenter,
  observeRecenter,
} from "./recenter";
export type { EmergencyQuote, EmergencyQuoteInput } from "./aomq";
export { isNearFloor, emergencyFeeBps, emergencyQuote } from "./aomq";

// ─────────────────────────────────────────────────────────────────────────────
// Preview
// ─────────────────────────────────────────────────────────────────────────────
export type { PreviewFees, LadderRow, PreviewLadder, RefreshOutcome, PreviewFeeError } from "./preview";
export {
  LADDER_MULTIPLES,
  requireSnapshot,
  refreshPreviewSnapshot,
  previewFees,
  previewFeesFresh,
  previewLadder,
} from "./preview";

// ─────────────────────────────────────────────────────────────────────────────
// Swap Engine
// ─────────────────────────────────────────────────────────────────────────────
export type { InitialPoolParams, RebalanceInput, RebalanceOutput } from "./swap-engine";
export { evaluateSwap, evaluateRebalance, createInitialPoolState } from "./swap-engine";
