/**
 * Carbon:nitrogen ratio type definitions
 */

/**
 * Ratio configuration
 */
export interface RatioConfig {
  /** C:N contributed by each nitrogen-rich item */
  GREEN_CN_RATIO: number;

  /** C:N contributed by each carbon-rich item */
  BROWN_CN_RATIO: number;

  /** Pile ratio that earns the full bonus */
  OPTIMAL_CN_RATIO: number;

  /** Modifier within 5 of optimal */
  OPTIMAL_RATIO_BONUS: number;

  /** Modifier more than 25 from optimal */
  POOR_RATIO_PENALTY: number;

  /** Ratios above this are treated as invalid */
  MAX_VALID_CN_RATIO: number;
}

export type RatioQualityText =
  | '(Excellent!)'
  | '(Good)'
  | '(Ok)'
  | '(Poor)'
  | '(Very Poor)'
  | '';

/**
 * Distance bands from the optimal ratio, inclusive upper bounds
 */
export const RATIO_BANDS = {
  EXCELLENT: 5,
  GOOD: 10,
  OK: 15,
  POOR: 25
} as const;
