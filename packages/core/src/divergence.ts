/**
 * Divergence Gate - Haircut bands and hysteresis over source disagreement
 *
 * Bands over deltaBps (accept < soft < hard):
 * - delta <= accept: healthy, counts towards clearing an active divergence
 * - accept < delta < hard: haircut added to the fee, streak reset
 * - delta >= soft: additionally marks the soft band (AOMQ trigger)
 * - delta >= hard: rejected
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { DivergenceError } from "./errors";
import type { Bps, DivergenceState, EngineEvent, FeatureFlags, OracleConfig } from "./types";

export interface DivergenceOutcome {
  state: DivergenceState;
  haircutBps: Bps;
  softBand: boolean;
  events: EngineEvent[];
}

export const createInitialDivergenceState = (): DivergenceState => ({
  active: false,
  lastDeltaBps: 0,
  healthyStreak: 0,
});

function diverged(deltaBps: Bps, hardBps: Bps): DivergenceError {
  return {
    type: "ORACLE_DIVERGED",
    deltaBps,
    hardBps,
    message: `Oracle divergence ${deltaBps} bps at or above ${hardBps} bps`,
  };
}

/**
 * Haircut for a delta inside the haircut band
 */
export function haircutFor(deltaBps: Bps, cfg: OracleConfig): Bps {
  return cfg.haircutMinBps + cfg.haircutSlopeBps * (deltaBps - cfg.divergenceAcceptBps);
}

/**
 * Evaluate one disagreement sample.
 *
 * @param deltaBps - Absent when the secondary is stale or missing; the check is then skipped
 */
export function evaluateDivergence(
  state: DivergenceState,
  deltaBps: Bps | undefined,
  cfg: OracleConfig,
  flags: FeatureFlags,
): Result<DivergenceOutcome, DivergenceError> {
  if (deltaBps === undefined) {
    return ok({ state, haircutBps: 0, softBand: false, events: [] });
  }

  if (!flags.enableSoftDivergence) {
    if (deltaBps > cfg.divergenceBps) return err(diverged(deltaBps, cfg.divergenceBps));
    return ok({ state: { ...state, lastDeltaBps: deltaBps }, haircutBps: 0, softBand: false, events: [] });
  }

  if (deltaBps >= cfg.divergenceHardBps) {
    return err(diverged(deltaBps, cfg.divergenceHardBps));
  }

  if (deltaBps > cfg.divergenceAcceptBps) {
    const haircutBps = haircutFor(deltaBps, cfg);
    const softBand = deltaBps >= cfg.divergenceSoftBps;
    return ok({
      state: { active: true, lastDeltaBps: deltaBps, healthyStreak: 0 },
      haircutBps,
      softBand,
      events: [{ type: "DIVERGENCE_HAIRCUT", deltaBps, haircutBps, softBand }],
    });
  }

  if (!state.active) {
    return ok({
      state: { active: false, lastDeltaBps: deltaBps, healthyStreak: 0 },
      haircutBps: 0,
      softBand: false,
      events: [],
    });
  }

  const healthyStreak = state.healthyStreak + 1;
  if (healthyStreak >= cfg.divergenceHysteresisCount) {
    return ok({
      state: { active: false, lastDeltaBps: deltaBps, healthyStreak: 0 },
      haircutBps: 0,
      softBand: false,
      events: [{ type: "DIVERGENCE_CLEARED", deltaBps, healthyStreak }],
    });
  }
  return ok({
    state: { active: true, lastDeltaBps: deltaBps, healthyStreak },
    haircutBps: 0,
    softBand: false,
    events: [],
  });
}
