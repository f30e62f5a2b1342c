/**
 * Composting engine helpers
 *
 * Pure rate arithmetic shared by update, telemetry and the simulator.
 */

import { clamp, isFiniteNumber } from '@utils/number';

import type { RateModifiers } from './types';

/**
 * Microbial activity for a pile of the given fill
 *
 * Small piles can't hold heat, so activity ramps linearly from 0 at empty
 * to 1 at the small-pile threshold.
 *
 * @param fillRatio - Items over capacity
 * @param smallPileRatio - Fill at which activity reaches 1
 * @returns Activity in 0..1
 */
export function calculateActivityLevel(fillRatio: number, smallPileRatio: number): number {
  if (!isFiniteNumber(fillRatio) || fillRatio <= 0) return 0;
  if (fillRatio >= smallPileRatio) return 1;
  return fillRatio / smallPileRatio;
}

/**
 * Slack for hourly increments that sum to just under 1
 */
const COMPLETION_TOLERANCE = 1e-9;

/**
 * Whether progress has reached completion
 * @param progress - Decomposition progress
 */
export function isProgressComplete(progress: number): boolean {
  return progress >= 1 - COMPLETION_TOLERANCE;
}

/**
 * Progress per hour for a set of modifiers
 *
 * @param hoursToComplete - Hours a neutral pile needs to finish
 * @param modifiers - Per-model multipliers
 * @returns Fraction of completion gained per hour
 *
 * @example
 * ```typescript
 * calculateDecompositionRate(240, { cn: 1, moisture: 1, aeration: 1, temperature: 1 }); // 1/240
 * ```
 */
export function calculateDecompositionRate(hoursToComplete: number, modifiers: RateModifiers): number {
  if (hoursToComplete <= 0) return 0;

  return (1 / hoursToComplete) *
    modifiers.cn *
    modifiers.moisture *
    modifiers.aeration *
    modifiers.temperature;
}

/**
 * Whole hours left at the current rate
 *
 * @param progress - Completion, 0..1
 * @param ratePerHour - Current rate
 * @param sentinel - Value reported when the pile is not progressing
 * @returns Floored hours, or the sentinel when rate is not positive
 */
export function calculateRemainingHours(progress: number, ratePerHour: number, sentinel: number): number {
  if (ratePerHour <= 0) return sentinel;
  return Math.floor(Math.max(0, 1 - progress) / ratePerHour);
}

/**
 * Whole percent complete
 */
export function toProgressPercent(progress: number): number {
  return Math.floor(clamp(progress * 100, 0, 100));
}

/**
 * Moisture removed by turning
 *
 * @param moistureLevel - Current moisture
 * @param tooWet - Whether the pile is above the too-wet threshold
 * @param dampThreshold - Level above which a damp pile dries slightly
 * @param wetDrying - Drying applied to a too-wet pile
 * @param dampDrying - Drying applied to a damp pile
 * @returns Level units to remove, 0 for a pile at or below dampThreshold
 */
export function calculateTurnDrying(
  moistureLevel: number,
  tooWet: boolean,
  dampThreshold: number,
  wetDrying: number,
  dampDrying: number
): number {
  if (tooWet) return wetDrying;
  if (moistureLevel > dampThreshold) return dampDrying;
  return 0;
}
