/**
 * Aeration model
 *
 * Oxygen availability falls as the pile settles and as excess water
 * fills air pockets; turning restores it.
 */

import type { Hours } from '$types';
import { clamp01, isFiniteNumber } from '@utils/number';
import { calculateHoursDelta, isGateDue } from '@utils/time';

import { calculateCompactionLoss, calculateMoistureAerationLoss } from './helpers';
import { AERATION_CONSTANTS } from './types';
import type { AerationState } from './types';

export function createAerationState(): AerationState {
  return {
    level: AERATION_CONSTANTS.DEFAULT_LEVEL,
    lastUpdateTime: 0,
    lastTurnTime: 0
  };
}

/**
 * Reset aeration state to defaults (MUTABLE)
 * @param state - State to reset (will be mutated)
 */
export function resetAeration(state: AerationState): void {
  state.level = AERATION_CONSTANTS.DEFAULT_LEVEL;
  state.lastUpdateTime = 0;
  state.lastTurnTime = 0;
}

/**
 * Stamp both clocks at `now` (MUTABLE)
 * @param state - State to stamp (will be mutated)
 * @param now - Current game-clock hours
 */
export function beginAeration(state: AerationState, now: Hours): void {
  state.lastUpdateTime = now;
  state.lastTurnTime = now;
}

/**
 * Hours since the last turn, 0 if the pile was never turned or stamped
 * @param state - Aeration state
 * @param now - Current game-clock hours
 * @returns Elapsed hours
 */
export function getHoursSinceLastTurn(state: AerationState, now: Hours): number {
  if (state.lastTurnTime === 0) return 0;
  return calculateHoursDelta(now, state.lastTurnTime);
}

/**
 * Apply settling and moisture loss if an hour has passed (MUTABLE)
 *
 * A state that was never stamped (restored from an older save, or updated
 * before the pile started) only records the clocks on its first call.
 * Compaction scales with the elapsed hours; moisture loss is per firing.
 *
 * @param state - Aeration state (will be mutated)
 * @param now - Current game-clock hours
 * @param moistureLevel - Moisture level after this tick's moisture update
 * @returns True when the level was recalculated
 */
export function updateAeration(state: AerationState, now: Hours, moistureLevel: number): boolean {
  if (state.lastUpdateTime === 0) {
    beginAeration(state, now);
    return false;
  }

  if (!isGateDue(now, state.lastUpdateTime, AERATION_CONSTANTS.UPDATE_INTERVAL_HOURS)) {
    return false;
  }

  const hours = calculateHoursDelta(now, state.lastUpdateTime);
  state.lastUpdateTime = now;

  const compaction = calculateCompactionLoss(hours, getHoursSinceLastTurn(state, now));
  const waterlogging = calculateMoistureAerationLoss(moistureLevel);
  state.level = clamp01(state.level - compaction - waterlogging);

  return true;
}

/**
 * Add aeration and stamp the turn clock (MUTABLE)
 *
 * Negative and non-finite amounts are ignored.
 *
 * @param state - Aeration state (will be mutated)
 * @param amount - Level units to add
 * @param now - Current game-clock hours
 */
export function aerate(state: AerationState, amount: number, now: Hours): void {
  if (!isFiniteNumber(amount) || amount < 0) return;
  state.level = clamp01(state.level + amount);
  state.lastTurnTime = now;
}

/**
 * Turn the pile: aerate by the standard turn boost (MUTABLE)
 * @param state - Aeration state (will be mutated)
 * @param now - Current game-clock hours
 */
export function turnAeration(state: AerationState, now: Hours): void {
  aerate(state, AERATION_CONSTANTS.TURN_AERATION_BOOST, now);
}

export function setAerationLevel(state: AerationState, level: number): void {
  if (!isFiniteNumber(level)) return;
  state.level = clamp01(level);
}
