/**
 * Aeration model type definitions
 */

import type { Hours } from '$types';

export const AERATION_CONSTANTS = {
  /** Freshly added material starts loose */
  DEFAULT_LEVEL: 0.7,

  COMPLETELY_ANAEROBIC_THRESHOLD: 0.2,
  ANAEROBIC_THRESHOLD: 0.3,
  OPTIMAL_MIN: 0.5,
  OPTIMAL_MAX: 0.9,
  OVER_AERATED_THRESHOLD: 0.95,

  /** Settling loss per elapsed hour, before the time-since-turn tier */
  BASE_COMPACTION_RATE: 0.01,
  /** Moisture level above which water fills air pockets */
  MOISTURE_LOSS_THRESHOLD: 0.6,
  MOISTURE_AERATION_FACTOR: 0.5,
  MOISTURE_LOSS_SCALE: 0.01,

  TURN_AERATION_BOOST: 0.4,

  /** Settling tiers, keyed on hours since the last turn */
  FRESH_SETTLING_HOURS: 24,
  SETTLED_HOURS: 72,
  FRESH_SETTLING_MULTIPLIER: 1.5,
  SETTLED_MULTIPLIER: 0.5,

  UPDATE_INTERVAL_HOURS: 1
} as const;

export type AerationBand =
  | 'Completely Anaerobic'
  | 'Anaerobic'
  | 'Low Oxygen'
  | 'Well Aerated'
  | 'Highly Aerated'
  | 'Over Aerated';

/**
 * Aeration model state
 */
export interface AerationState {
  /** Oxygen availability, 0 (anaerobic) to 1 (fully aerated) */
  level: number;

  /** Game hour of the last settling update, 0 if never */
  lastUpdateTime: Hours;

  /** Game hour of the last turn or manual aeration, 0 if never */
  lastTurnTime: Hours;
}
