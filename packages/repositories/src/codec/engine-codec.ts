/**
 * Engine Codec - JSON <-> engine values
 *
 * Engine state, config and events carry bigint amounts. They are stored as
 * decimal strings (jsonb) and parsed back with zod. The parameter file read
 * by the mirror uses the same config schema.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import type { EngineConfig, EngineEvent, PoolState } from "@dnmm/core";
import { toJsonValue, type JsonValue } from "@dnmm/utils";

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

/** Decimal string (or safe integer) → bigint */
export const bigintSchema = z
  .union([z.string().regex(/^-?\d+$/, "expected an integer string"), z.number().int()])
  .transform((value) => BigInt(value));

const int = z.number().int();
const bps = int.nonnegative();

// ─────────────────────────────────────────────────────────────────────────────
// State
// ─────────────────────────────────────────────────────────────────────────────

export const poolStateSchema = z.object({
  fee: z.object({ lastFeeBps: bps, lastTick: int }),
  divergence: z.object({ active: z.boolean(), lastDeltaBps: bps, healthyStreak: int }),
  sigma: z.object({ sigmaBps: bps, lastMid: bigintSchema, lastTick: int }),
  inventory: z.object({
    baseReserves: bigintSchema,
    quoteReserves: bigintSchema,
    targetBaseStar: bigintSchema,
    lastRebalancePrice: bigintSchema,
    lastRebalanceAt: int,
  }),
  recenter: z.object({ armed: z.boolean(), healthyStreak: int }),
  preview: z
    .object({
      timestamp: int,
      midUsed: bigintSchema,
      sigmaBps: bps,
      confBps: bps,
      divergenceBps: bps,
      spreadBps: bps.optional(),
    })
    .optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Config
// ─────────────────────────────────────────────────────────────────────────────

export const oracleConfigSchema = z.object({
  maxAgeSec: int,
  secondaryMaxAgeSec: int,
  confCapBpsSpot: bps,
  confCapBpsStrict: bps,
  allowEmaFallback: z.boolean(),
  confWeightSpreadBps: bps,
  confWeightSigmaBps: bps,
  confWeightSecondaryBps: bps,
  sigmaEwmaLambdaBps: bps,
  divergenceBps: bps,
  divergenceAcceptBps: bps,
  divergenceSoftBps: bps,
  divergenceHardBps: bps,
  haircutMinBps: bps,
  haircutSlopeBps: bps,
  divergenceHysteresisCount: int,
});

export const feeConfigSchema = z.object({
  baseBps: bps,
  alphaNumerator: int,
  alphaDenominator: int,
  betaInvDevNumerator: int,
  betaInvDevDenominator: int,
  capBps: bps,
  decayPctPerBlock: int,
  gammaSizeLinBps: bps,
  gammaSizeQuadBps: bps,
  sizeFeeCapBps: bps,
  kappaLvrBps: bps,
  lvrFeeCapBps: bps,
});

export const inventoryConfigSchema = z.object({
  floorBps: bps,
  recenterThresholdPct: int,
  recenterCooldownSec: int,
  recenterRearmCount: int,
  invTiltBpsPer1pct: bps,
  invTiltMaxBps: bps,
  tiltConfWeightBps: bps,
  tiltSpreadWeightBps: bps,
});

export const makerConfigSchema = z.object({
  s0Notional: bigintSchema,
  ttlMs: int,
  alphaBboBps: bps,
  betaFloorBps: bps,
});

export const aomqConfigSchema = z.object({
  minQuoteNotional: bigintSchema,
  emergencySpreadBps: bps,
  floorEpsilonBps: bps,
});

export const previewConfigSchema = z.object({
  maxAgeSec: int,
  snapshotCooldownSec: int,
  revertOnStalePreview: z.boolean(),
  enablePreviewFresh: z.boolean(),
});

export const rebateConfigSchema = z.object({
  rebates: z.record(z.string(), bps),
});

export const featureFlagsSchema = z.object({
  blendOn: z.boolean(),
  enableSoftDivergence: z.boolean(),
  enableSizeFee: z.boolean(),
  enableBboFloor: z.boolean(),
  enableInvTilt: z.boolean(),
  enableAOMQ: z.boolean(),
  enableRebates: z.boolean(),
  enableAutoRecenter: z.boolean(),
  enableLvrFee: z.boolean(),
});

export const engineConfigSchema = z.object({
  oracle: oracleConfigSchema,
  fee: feeConfigSchema,
  inventory: inventoryConfigSchema,
  maker: makerConfigSchema,
  aomq: aomqConfigSchema,
  preview: previewConfigSchema,
  rebates: rebateConfigSchema,
  flags: featureFlagsSchema,
});

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export const engineEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("DIVERGENCE_HAIRCUT"), deltaBps: bps, haircutBps: bps, softBand: z.boolean() }),
  z.object({ type: z.literal("DIVERGENCE_REJECTED"), deltaBps: bps, hardBps: bps }),
  z.object({ type: z.literal("DIVERGENCE_CLEARED"), deltaBps: bps, healthyStreak: int }),
  z.object({
    type: z.literal("AOMQ_ACTIVATED"),
    trigger: z.enum(["SOFT_DIVERGENCE", "CONF_CAP", "NEAR_FLOOR"]),
    isBaseIn: z.boolean(),
    triggerNotional: bigintSchema,
    emergencySpreadBps: bps,
  }),
  z.object({
    type: z.literal("RECENTER_COMMITTED"),
    trigger: z.enum(["manual", "auto"]),
    price: bigintSchema,
    previousTarget: bigintSchema,
    newTarget: bigintSchema,
    deviationBps: bps,
  }),
  z.object({
    type: z.literal("PREVIEW_SNAPSHOT_REFRESHED"),
    timestamp: int,
    midUsed: bigintSchema,
    confBps: bps,
    divergenceBps: bps,
  }),
]);

// ─────────────────────────────────────────────────────────────────────────────
// Encode / Decode
// ─────────────────────────────────────────────────────────────────────────────

export type CodecError = { type: "CODEC_ERROR"; message: string };

function codecError(what: string, error: z.ZodError): CodecError {
  const issues = error.issues.map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`);
  return { type: "CODEC_ERROR", message: `Invalid ${what}: ${issues.join("; ")}` };
}

export function encodePoolState(state: PoolState): JsonValue {
  return toJsonValue(state);
}

export function decodePoolState(json: unknown): Result<PoolState, CodecError> {
  const parsed = poolStateSchema.safeParse(json);
  if (!parsed.success) return err(codecError("pool state", parsed.error));
  return ok(parsed.data);
}

export function encodeEngineConfig(config: EngineConfig): JsonValue {
  return toJsonValue(config);
}

export function decodeEngineConfig(json: unknown): Result<EngineConfig, CodecError> {
  const parsed = engineConfigSchema.safeParse(json);
  if (!parsed.success) return err(codecError("engine config", parsed.error));
  return ok(parsed.data);
}

export function encodeEngineEvent(event: EngineEvent): JsonValue {
  return toJsonValue(event);
}

export function decodeEngineEvent(json: unknown): Result<EngineEvent, CodecError> {
  const parsed = engineEventSchema.safeParse(json);
  if (!parsed.success) return err(codecError("engine event", parsed.error));
  return ok(parsed.data);
}

export const configReasonSchema = z.enum([
  "initial",
  "oracle",
  "fee",
  "inventory",
  "maker",
  "aomq",
  "preview",
  "rebates",
  "flags",
]);
