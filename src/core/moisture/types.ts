/**
 * Moisture model type definitions
 */

import type { ClimateSample, Hours } from '$types';

/**
 * Model constants
 *
 * Thresholds double as the breakpoints of the modifier curve and the
 * named state bands.
 */
export const MOISTURE_CONSTANTS = {
  DEFAULT_LEVEL: 0.5,

  BONE_DRY_THRESHOLD: 0.2,
  TOO_DRY_THRESHOLD: 0.3,
  OPTIMAL_MIN: 0.4,
  OPTIMAL_MAX: 0.6,
  TOO_WET_THRESHOLD: 0.7,
  WATERLOGGED_THRESHOLD: 0.85,

  /** Evaporation per hourly update at 0 °C */
  BASE_EVAPORATION_RATE: 0.02,
  /** Extra evaporation per °C of positive air temperature */
  TEMPERATURE_EVAPORATION_FACTOR: 0.001,
  /** Evaporation multiplier while it is raining on the pile */
  RAIN_EVAPORATION_REDUCTION: 0.1,
  /** Gain at full rainfall intensity */
  MAX_RAIN_GAIN_PER_HOUR: 0.1,

  UPDATE_INTERVAL_HOURS: 1
} as const;

/**
 * Named moisture band
 */
export type MoistureBand =
  | 'Bone Dry'
  | 'Too Dry'
  | 'Slightly Dry'
  | 'Optimal'
  | 'Slightly Wet'
  | 'Too Wet'
  | 'Waterlogged';

/**
 * Moisture model state
 */
export interface MoistureState {
  /** Wetness, 0 (bone dry) to 1 (saturated) */
  level: number;

  /** Game hour of the last environmental update, 0 if never */
  lastCheckTime: Hours;
}

/**
 * Environmental inputs for one moisture update
 */
export interface MoistureEnvironment {
  /** Current climate at the pile */
  climate: ClimateSample;

  /** Whether rain can reach the pile (no roof above it) */
  rainExposed: boolean;
}
