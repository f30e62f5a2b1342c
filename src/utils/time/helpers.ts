/**
 * Time helper functions
 */

import { isFiniteNumber } from '../number';

/**
 * Calculate elapsed game hours with bounds checking
 *
 * Backwards or broken clocks (non-finite, zero or negative deltas) report 0,
 * which every caller treats as "no update due".
 *
 * @param currentTime - Current game-clock hours
 * @param lastTime - Previous game-clock hours
 * @returns Elapsed hours, or 0
 */
export function calculateHoursDelta(currentTime: number, lastTime: number): number {
  if (!isFiniteNumber(currentTime) || !isFiniteNumber(lastTime)) {
    return 0;
  }

  const dt = currentTime - lastTime;
  return dt > 0 ? dt : 0;
}

/**
 * Check whether an hourly-gated update is due
 *
 * @param currentTime - Current game-clock hours
 * @param lastTime - Time the gate last fired
 * @param gateHours - Minimum hours between firings
 * @returns True once at least gateHours have elapsed
 */
export function isGateDue(currentTime: number, lastTime: number, gateHours: number): boolean {
  const dt = calculateHoursDelta(currentTime, lastTime);
  return dt > 0 && dt >= gateHours;
}
