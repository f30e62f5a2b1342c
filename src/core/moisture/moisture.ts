/**
 * Moisture model
 *
 * Tracks pile wetness in 0..1. Rain and evaporation are applied at most once
 * per elapsed game hour; watering and dry material apply immediately.
 */

import type { Hours } from '$types';
import { clamp01, isFiniteNumber } from '@utils/number';
import { isGateDue } from '@utils/time';

import { calculateEvaporation, calculateRainGain, isRainingOnPile } from './helpers';
import { MOISTURE_CONSTANTS } from './types';
import type { MoistureEnvironment, MoistureState } from './types';

/**
 * Create moisture state at the default level
 * @returns Fresh state (level 0.5, never checked)
 */
export function createMoistureState(): MoistureState {
  return {
    level: MOISTURE_CONSTANTS.DEFAULT_LEVEL,
    lastCheckTime: 0
  };
}

/**
 * Reset moisture state to defaults (MUTABLE)
 * @param state - State to reset (will be mutated)
 */
export function resetMoisture(state: MoistureState): void {
  state.level = MOISTURE_CONSTANTS.DEFAULT_LEVEL;
  state.lastCheckTime = 0;
}

/**
 * Start the hourly gate at `now` (MUTABLE)
 *
 * The first environmental update then lands one hour after the pile starts.
 *
 * @param state - State to stamp (will be mutated)
 * @param now - Current game-clock hours
 */
export function beginMoisture(state: MoistureState, now: Hours): void {
  state.lastCheckTime = now;
}

/**
 * Apply rain and evaporation if an hour has passed (MUTABLE)
 *
 * Effects are per firing, not per elapsed hour: a pile left alone for a day
 * and updated once sees a single hour's worth of rain and evaporation.
 *
 * @param state - Moisture state (will be mutated)
 * @param now - Current game-clock hours
 * @param evaporationMultiplier - Pile-heat multiplier from the previous temperature update
 * @param env - Climate and rain exposure
 * @returns True when the gate fired and the level was recalculated
 */
export function updateMoisture(
  state: MoistureState,
  now: Hours,
  evaporationMultiplier: number,
  env: MoistureEnvironment
): boolean {
  if (!isGateDue(now, state.lastCheckTime, MOISTURE_CONSTANTS.UPDATE_INTERVAL_HOURS)) {
    return false;
  }

  state.lastCheckTime = now;

  const raining = isRainingOnPile(env);
  if (raining) {
    state.level = clamp01(state.level + calculateRainGain(env.climate.rainfall));
  }

  const evaporation = calculateEvaporation(env.climate.temperature, raining, evaporationMultiplier);
  state.level = clamp01(state.level - evaporation);

  return true;
}

/**
 * Add water (MUTABLE)
 *
 * Negative or non-finite amounts are ignored.
 *
 * @param state - Moisture state (will be mutated)
 * @param amount - Level units to add
 */
export function addWater(state: MoistureState, amount: number): void {
  if (!isFiniteNumber(amount) || amount < 0) return;
  state.level = clamp01(state.level + amount);
}

/**
 * Add dry material (MUTABLE)
 *
 * Negative or non-finite amounts are ignored.
 *
 * @param state - Moisture state (will be mutated)
 * @param amount - Level units to remove
 */
export function addDryMaterial(state: MoistureState, amount: number): void {
  if (!isFiniteNumber(amount) || amount < 0) return;
  state.level = clamp01(state.level - amount);
}

/**
 * Set the level directly, clamped (MUTABLE)
 * @param state - Moisture state (will be mutated)
 * @param level - New level
 */
export function setMoistureLevel(state: MoistureState, level: number): void {
  if (!isFiniteNumber(level)) return;
  state.level = clamp01(level);
}
