/**
 * Aeration helper functions
 */

import { AERATION_CONSTANTS } from './types';
import type { AerationBand } from './types';

/**
 * Settling loss for an update covering `hours`
 *
 * Loose material settles fastest in the first day after a turn, then slows
 * once the pile has compacted.
 *
 * @param hours - Hours covered by this update
 * @param hoursSinceTurn - Hours since the pile was last turned
 * @returns Aeration lost to compaction
 *
 * @example
 * ```typescript
 * calculateCompactionLoss(2, 10);  // 0.03
 * calculateCompactionLoss(2, 100); // 0.01
 * ```
 */
export function calculateCompactionLoss(hours: number, hoursSinceTurn: number): number {
  const base = AERATION_CONSTANTS.BASE_COMPACTION_RATE * hours;

  if (hoursSinceTurn < AERATION_CONSTANTS.FRESH_SETTLING_HOURS) {
    return base * AERATION_CONSTANTS.FRESH_SETTLING_MULTIPLIER;
  }
  if (hoursSinceTurn < AERATION_CONSTANTS.SETTLED_HOURS) {
    return base;
  }
  return base * AERATION_CONSTANTS.SETTLED_MULTIPLIER;
}

/**
 * Aeration lost to excess water, per update
 * @param moistureLevel - Current moisture level
 * @returns Loss, 0 at or below the threshold
 */
export function calculateMoistureAerationLoss(moistureLevel: number): number {
  if (moistureLevel <= AERATION_CONSTANTS.MOISTURE_LOSS_THRESHOLD) {
    return 0;
  }

  const excess = moistureLevel - AERATION_CONSTANTS.MOISTURE_LOSS_THRESHOLD;
  return excess * AERATION_CONSTANTS.MOISTURE_AERATION_FACTOR * AERATION_CONSTANTS.MOISTURE_LOSS_SCALE;
}

/**
 * Decomposition rate modifier for an aeration level
 *
 * Over-aerated piles lose heat and moisture, so the top band
 * is slightly below neutral.
 *
 * @param level - Aeration level
 * @returns Multiplier on the base decomposition rate
 */
export function getAerationModifier(level: number): number {
  if (level < AERATION_CONSTANTS.COMPLETELY_ANAEROBIC_THRESHOLD) return 0.1;
  if (level < AERATION_CONSTANTS.ANAEROBIC_THRESHOLD) return 0.3;
  if (level < AERATION_CONSTANTS.OPTIMAL_MIN) return 0.7;
  if (level <= AERATION_CONSTANTS.OPTIMAL_MAX) return 1.0;
  return 0.9;
}

export function getAerationState(level: number): AerationBand {
  if (level < AERATION_CONSTANTS.COMPLETELY_ANAEROBIC_THRESHOLD) return 'Completely Anaerobic';
  if (level < AERATION_CONSTANTS.ANAEROBIC_THRESHOLD) return 'Anaerobic';
  if (level < AERATION_CONSTANTS.OPTIMAL_MIN) return 'Low Oxygen';
  if (level <= AERATION_CONSTANTS.OPTIMAL_MAX) return 'Well Aerated';
  if (level <= AERATION_CONSTANTS.OVER_AERATED_THRESHOLD) return 'Highly Aerated';
  return 'Over Aerated';
}

export function isAerationOptimal(level: number): boolean {
  return level >= AERATION_CONSTANTS.OPTIMAL_MIN && level <= AERATION_CONSTANTS.OPTIMAL_MAX;
}

export function isAnaerobic(level: number): boolean {
  return level < AERATION_CONSTANTS.ANAEROBIC_THRESHOLD;
}

export function isOverAerated(level: number): boolean {
  return level > AERATION_CONSTANTS.OVER_AERATED_THRESHOLD;
}
