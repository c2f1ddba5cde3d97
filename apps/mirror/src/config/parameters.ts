/**
 * Parameter File Loader
 *
 * - JSON file parsed with the shared zod config schema
 * - Then validated by the core ParamGate (all-or-nothing)
 * - Amounts and WAD prices are integer strings
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import { validateEngineConfig, type Amount, type ConfigError, type EngineConfig } from "@dnmm/core";
import { bigintSchema, engineConfigSchema } from "@dnmm/repositories";
import type { StaticPrice } from "@dnmm/adapters";

export const DEFAULT_PARAMETERS_PATH = fileURLToPath(new URL("../../config/parameters.default.json", import.meta.url));

const referencePriceSchema = z.object({
  mid: bigintSchema.optional(),
  bid: bigintSchema.optional(),
  ask: bigintSchema.optional(),
  confidenceBps: z.number().int().nonnegative().optional(),
});

export const mirrorParametersSchema = z.object({
  poolId: z.string().min(1),
  initial: z.object({
    baseReserves: bigintSchema,
    quoteReserves: bigintSchema,
    targetBaseStar: bigintSchema.optional(),
  }),
  oracle: z.object({
    primary: referencePriceSchema,
    ema: referencePriceSchema.optional(),
    secondary: referencePriceSchema.optional(),
  }),
  config: engineConfigSchema,
});

/** A reference price without its publish time; the mirror stamps it */
export type ReferencePrice = Omit<StaticPrice, "publishedAtSec" | "status">;

export interface MirrorParameters {
  poolId: string;
  initial: { baseReserves: Amount; quoteReserves: Amount; targetBaseStar?: Amount };
  oracle: { primary: ReferencePrice; ema?: ReferencePrice; secondary?: ReferencePrice };
  config: EngineConfig;
}

export type ParametersError =
  | { type: "PARAMETERS_READ_FAILED"; path: string; message: string }
  | { type: "PARAMETERS_INVALID"; message: string }
  | ConfigError;

/**
 * Validate already-parsed JSON.
 */
export function parseParameters(json: unknown): Result<MirrorParameters, ParametersError> {
  const parsed = mirrorParametersSchema.safeParse(json);
  if (!parsed.success) {
    return err({ type: "PARAMETERS_INVALID", message: z.prettifyError(parsed.error) });
  }
  const parameters = parsed.data;
  return validateEngineConfig(parameters.config).map((config) => ({ ...parameters, config }));
}

export function loadParameters(path: string = DEFAULT_PARAMETERS_PATH): Result<MirrorParameters, ParametersError> {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    return err({
      type: "PARAMETERS_READ_FAILED",
      path,
      message: error instanceof Error ? error.message : String(error),
    });
  }
  return parseParameters(json);
}
