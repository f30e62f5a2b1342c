/**
 * Carbon:nitrogen ratio model
 *
 * Derives the pile ratio from item counts and scores its distance from
 * optimal. Counts are supplied by the caller on every query.
 */

import { getRatioDistance, isValidRatio } from './helpers';
import { RATIO_BANDS } from './types';
import type { RatioConfig, RatioQualityText } from './types';

/**
 * Pile C:N ratio from item counts
 *
 * @param greenCount - Nitrogen-rich items
 * @param brownCount - Carbon-rich items
 * @param config - Ratio configuration
 * @returns 0 for an empty pile, otherwise the count-weighted average
 *
 * @example
 * ```typescript
 * calculateCNRatio(3, 1, CONFIG); // (3 × 15 + 1 × 60) / 4 = 26.25
 * ```
 */
export function calculateCNRatio(greenCount: number, brownCount: number, config: RatioConfig): number {
  const greens = Math.max(0, greenCount);
  const browns = Math.max(0, brownCount);
  const total = greens + browns;

  if (total === 0) return 0;
  if (greens === 0) return config.BROWN_CN_RATIO;
  if (browns === 0) return config.GREEN_CN_RATIO;

  return (greens * config.GREEN_CN_RATIO + browns * config.BROWN_CN_RATIO) / total;
}

/**
 * Decomposition rate modifier for a pile ratio
 *
 * | distance from optimal | modifier              |
 * |-----------------------|-----------------------|
 * | ≤ 5                   | OPTIMAL_RATIO_BONUS   |
 * | ≤ 10                  | 1.2                   |
 * | ≤ 15                  | 1.0                   |
 * | ≤ 25                  | 0.8                   |
 * | > 25                  | POOR_RATIO_PENALTY    |
 *
 * Invalid ratios are neutral (1.0).
 *
 * @param ratio - Pile C:N ratio
 * @param config - Ratio configuration
 * @returns Multiplier on the base decomposition rate
 */
export function getCNModifier(ratio: number, config: RatioConfig): number {
  if (!isValidRatio(ratio, config)) return 1.0;

  const distance = getRatioDistance(ratio, config);

  if (distance <= RATIO_BANDS.EXCELLENT) return config.OPTIMAL_RATIO_BONUS;
  if (distance <= RATIO_BANDS.GOOD) return 1.2;
  if (distance <= RATIO_BANDS.OK) return 1.0;
  if (distance <= RATIO_BANDS.POOR) return 0.8;
  return config.POOR_RATIO_PENALTY;
}

/**
 * Short quality label for a pile ratio, empty when invalid
 */
export function getCNRatioQualityText(ratio: number, config: RatioConfig): RatioQualityText {
  if (!isValidRatio(ratio, config)) return '';

  const distance = getRatioDistance(ratio, config);

  if (distance <= RATIO_BANDS.EXCELLENT) return '(Excellent!)';
  if (distance <= RATIO_BANDS.GOOD) return '(Good)';
  if (distance <= RATIO_BANDS.OK) return '(Ok)';
  if (distance <= RATIO_BANDS.POOR) return '(Poor)';
  return '(Very Poor)';
}
