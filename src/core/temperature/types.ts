/**
 * Temperature model type definitions
 */

import type { Hours } from '$types';

export const TEMPERATURE_CONSTANTS = {
  DEFAULT_TEMPERATURE_C: 20,

  COLD_C: 10,
  TOO_COLD_C: 20,
  WARM_C: 30,
  THERMOPHILIC_MIN_C: 40,
  PEAK_MAX_C: 55,
  THERMOPHILIC_MAX_C: 65,
  CRITICAL_C: 70,
  FREEZING_ACTIVITY_C: 5,

  /** °C per hour at full activity */
  BASE_HEAT_GENERATION: 2,
  MAX_HEAT_GENERATION: 10,
  HEAT_LOSS_COEFFICIENT: 0.5,
  EVAPORATIVE_COOLING: 1.5,
  EVAPORATIVE_MOISTURE_THRESHOLD: 0.5,
  /** Degrees above ambient at which evaporative effects double */
  EVAPORATION_REFERENCE_DELTA_C: 50,
  TURNING_HEAT_LOSS_FRACTION: 0.4,

  /** A pile can't cool much below the air around it */
  BELOW_AMBIENT_FLOOR_C: 5,
  MAX_PILE_C: 80,
  MIN_SET_C: -10,

  UPDATE_INTERVAL_HOURS: 1
} as const;

export type TemperatureBand =
  | 'Cold'
  | 'Cool'
  | 'Warm'
  | 'Getting Hot'
  | 'Thermophilic'
  | 'Too Hot'
  | 'Critically Hot';

/**
 * Temperature model state
 */
export interface TemperatureState {
  /** Pile core temperature in °C */
  internal: number;

  /** Air temperature at the last refresh, in °C */
  ambient: number;

  /** Game hour of the last heat-balance update, 0 if never */
  lastUpdateTime: Hours;
}

/**
 * Pile conditions feeding one heat-balance update
 */
export interface TemperatureInputs {
  /** Microbial activity, 0..1 (ramps down for small piles) */
  activity: number;

  moistureLevel: number;

  aerationLevel: number;

  /** C:N rate modifier; an unbalanced pile runs cooler */
  cnModifier: number;

  /** Fill ratio, 0..1; larger piles hold heat better */
  pileSize: number;
}
