/**
 * Time utility functions
 *
 * Two clocks are in play: wall-clock seconds (logger uptime) and game-clock
 * hours (everything the simulation integrates over).
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Get current wall-clock Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Format a game-clock timestamp for humans
 *
 * @param hours - Game-clock hours since world start
 * @returns String like "day 3 04:30"
 *
 * @example
 * ```typescript
 * formatGameTime(52.5); // "day 3 04:30"
 * ```
 */
export function formatGameTime(hours: number): string {
  const day = Math.floor(hours / TIME_CONSTANTS.HOURS_PER_DAY) + 1;
  const hourOfDay = hours - (day - 1) * TIME_CONSTANTS.HOURS_PER_DAY;
  const wholeHour = Math.floor(hourOfDay);
  const minutes = Math.floor((hourOfDay - wholeHour) * TIME_CONSTANTS.MINUTES_PER_HOUR);

  return 'day ' + day + ' ' + pad2(wholeHour) + ':' + pad2(minutes);
}

function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}
