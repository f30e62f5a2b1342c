/**
 * Moisture helper functions
 *
 * Pure curves and predicates over a moisture level.
 */

import { clamp01 } from '@utils/number';

import { MOISTURE_CONSTANTS } from './types';
import type { MoistureBand, MoistureEnvironment } from './types';

/**
 * Whether rain is currently falling on the pile
 * @param env - Environmental inputs
 * @returns True when exposed and rainfall is positive
 */
export function isRainingOnPile(env: MoistureEnvironment): boolean {
  return env.rainExposed && env.climate.rainfall > 0;
}

/**
 * Moisture gained from one hourly rain update
 * @param rainfall - Rainfall intensity (clamped to 0..1)
 * @returns Gain in level units, at most MAX_RAIN_GAIN_PER_HOUR
 */
export function calculateRainGain(rainfall: number): number {
  return clamp01(rainfall) * MOISTURE_CONSTANTS.MAX_RAIN_GAIN_PER_HOUR;
}

/**
 * Moisture lost to evaporation in one hourly update
 *
 * @param airTemperature - Ambient air temperature in °C
 * @param raining - Whether rain is falling on the pile
 * @param pileMultiplier - Evaporation multiplier from pile heat (1 = pile at ambient)
 * @returns Loss in level units
 *
 * @example
 * ```typescript
 * calculateEvaporation(20, false, 1); // 0.04
 * calculateEvaporation(20, true, 1);  // 0.004
 * ```
 */
export function calculateEvaporation(
  airTemperature: number,
  raining: boolean,
  pileMultiplier: number
): number {
  let rate: number = MOISTURE_CONSTANTS.BASE_EVAPORATION_RATE;

  if (airTemperature > 0) {
    rate += airTemperature * MOISTURE_CONSTANTS.TEMPERATURE_EVAPORATION_FACTOR;
  }

  rate *= pileMultiplier;

  if (raining) {
    rate *= MOISTURE_CONSTANTS.RAIN_EVAPORATION_REDUCTION;
  }

  return rate;
}

/**
 * Decomposition rate modifier for a moisture level
 *
 * | level        | modifier |
 * |--------------|----------|
 * | < 0.2        | 0.1      |
 * | 0.2 – <0.3   | 0.5      |
 * | 0.3 – <0.4   | 0.8      |
 * | 0.4 – 0.6    | 1.0      |
 * | >0.6 – 0.7   | 0.8      |
 * | >0.7 – 0.85  | 0.4      |
 * | > 0.85       | 0.2      |
 *
 * @param level - Moisture level
 * @returns Multiplier on the base decomposition rate
 */
export function getMoistureModifier(level: number): number {
  if (level < MOISTURE_CONSTANTS.BONE_DRY_THRESHOLD) return 0.1;
  if (level < MOISTURE_CONSTANTS.TOO_DRY_THRESHOLD) return 0.5;
  if (level < MOISTURE_CONSTANTS.OPTIMAL_MIN) return 0.8;
  if (level <= MOISTURE_CONSTANTS.OPTIMAL_MAX) return 1.0;
  if (level <= MOISTURE_CONSTANTS.TOO_WET_THRESHOLD) return 0.8;
  if (level <= MOISTURE_CONSTANTS.WATERLOGGED_THRESHOLD) return 0.4;
  return 0.2;
}

/**
 * Named band for a moisture level (same breakpoints as the modifier)
 * @param level - Moisture level
 * @returns Band name
 */
export function getMoistureState(level: number): MoistureBand {
  if (level < MOISTURE_CONSTANTS.BONE_DRY_THRESHOLD) return 'Bone Dry';
  if (level < MOISTURE_CONSTANTS.TOO_DRY_THRESHOLD) return 'Too Dry';
  if (level < MOISTURE_CONSTANTS.OPTIMAL_MIN) return 'Slightly Dry';
  if (level <= MOISTURE_CONSTANTS.OPTIMAL_MAX) return 'Optimal';
  if (level <= MOISTURE_CONSTANTS.TOO_WET_THRESHOLD) return 'Slightly Wet';
  if (level <= MOISTURE_CONSTANTS.WATERLOGGED_THRESHOLD) return 'Too Wet';
  return 'Waterlogged';
}

export function isMoistureOptimal(level: number): boolean {
  return level >= MOISTURE_CONSTANTS.OPTIMAL_MIN && level <= MOISTURE_CONSTANTS.OPTIMAL_MAX;
}

export function isTooDry(level: number): boolean {
  return level < MOISTURE_CONSTANTS.TOO_DRY_THRESHOLD;
}

export function isTooWet(level: number): boolean {
  return level > MOISTURE_CONSTANTS.TOO_WET_THRESHOLD;
}

export function isBoneDry(level: number): boolean {
  return level < MOISTURE_CONSTANTS.BONE_DRY_THRESHOLD;
}

export function isWaterlogged(level: number): boolean {
  return level > MOISTURE_CONSTANTS.WATERLOGGED_THRESHOLD;
}
