/**
 * Engine Errors
 *
 * Closed tagged unions returned through neverthrow Results.
 * Every error is terminal for the call and leaves persisted state untouched.
 */

import type { Bps, Sec } from "./types";

export type OracleSourceName = "primary" | "ema" | "secondary";

export type OracleError =
  | { type: "ORACLE_READ_FAILED"; source: OracleSourceName; message: string }
  | { type: "ORACLE_STALE"; ageSec: Sec; maxAgeSec: Sec; message: string }
  | { type: "MID_UNSET"; message: string }
  | { type: "CONF_CAP_EXCEEDED"; confidenceBps: Bps; capBps: Bps; message: string };

export type DivergenceError = {
  type: "ORACLE_DIVERGED";
  deltaBps: Bps;
  hardBps: Bps;
  message: string;
};

export type PreviewError =
  | { type: "PREVIEW_SNAPSHOT_STALE"; ageSec: Sec; maxAgeSec: Sec; message: string }
  | { type: "PREVIEW_SNAPSHOT_UNSET"; message: string }
  | { type: "PREVIEW_FRESH_DISABLED"; message: string };

export type RecenterError =
  | { type: "RECENTER_THRESHOLD"; deviationBps: Bps; thresholdBps: Bps; message: string }
  | { type: "RECENTER_COOLDOWN"; remainingSec: Sec; armed: boolean; message: string };

export type ConfigError =
  | { type: "INVALID_CONFIG"; field: string; reason: string; message: string }
  | { type: "FEE_CAP_TOO_HIGH"; capBps: Bps; maxCapBps: Bps; message: string }
  | { type: "FEE_BASE_ABOVE_CAP"; baseBps: Bps; capBps: Bps; message: string };

export type SwapError = { type: "ZERO_AMOUNT"; message: string };

export type EngineError = OracleError | DivergenceError | PreviewError | RecenterError | ConfigError | SwapError;

export type EngineErrorType = EngineError["type"];

export const invalidConfig = (field: string, reason: string): ConfigError => ({
  type: "INVALID_CONFIG",
  field,
  reason,
  message: `Invalid config ${field}: ${reason}`,
});
