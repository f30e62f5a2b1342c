/**
 * Common type definitions used throughout the project
 */

/**
 * Game-clock timestamp or duration, in in-game hours
 */
export type Hours = number;

/**
 * Material category used for the carbon:nitrogen ratio
 * green = nitrogen-rich, brown = carbon-rich
 */
export type MaterialKind = 'green' | 'brown';

/**
 * Climate sample at the pile's position
 */
export interface ClimateSample {
  /** Air temperature in °C */
  temperature: number;
  /** Rainfall intensity, 0..1 */
  rainfall: number;
}

/**
 * Opaque handle returned by a timer
 */
export type TimerHandle = ReturnType<typeof setInterval>;

/**
 * Timer API abstraction (setInterval/clearInterval in production, mock in tests)
 */
export interface TimerAPI {
  /** Start a timer, repeating when `repeat` is true */
  set(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle;
  /** Stop a timer started by set() */
  clear(handle: TimerHandle): void;
}
