/**
 * Carbon:nitrogen ratio helpers
 */

import { RatioConfigValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { RatioConfig } from './types';

/**
 * Validate ratio configuration
 * @throws {RatioConfigValidationError} If a ratio, bonus or penalty is unusable
 */
export function validateRatioConfig(config: RatioConfig): void {
  if (!isFiniteNumber(config.GREEN_CN_RATIO) || config.GREEN_CN_RATIO <= 0) {
    throw new RatioConfigValidationError(
      `GREEN_CN_RATIO must be positive (got ${config.GREEN_CN_RATIO})`
    );
  }
  if (!isFiniteNumber(config.BROWN_CN_RATIO) || config.BROWN_CN_RATIO <= 0) {
    throw new RatioConfigValidationError(
      `BROWN_CN_RATIO must be positive (got ${config.BROWN_CN_RATIO})`
    );
  }
  if (
    !isFiniteNumber(config.OPTIMAL_CN_RATIO) ||
    config.OPTIMAL_CN_RATIO <= 0 ||
    config.OPTIMAL_CN_RATIO > config.MAX_VALID_CN_RATIO
  ) {
    throw new RatioConfigValidationError(
      `OPTIMAL_CN_RATIO must be in (0, ${config.MAX_VALID_CN_RATIO}] (got ${config.OPTIMAL_CN_RATIO})`
    );
  }
  if (!isFiniteNumber(config.OPTIMAL_RATIO_BONUS) || config.OPTIMAL_RATIO_BONUS <= 0) {
    throw new RatioConfigValidationError('OPTIMAL_RATIO_BONUS must be positive');
  }
  if (!isFiniteNumber(config.POOR_RATIO_PENALTY) || config.POOR_RATIO_PENALTY <= 0) {
    throw new RatioConfigValidationError('POOR_RATIO_PENALTY must be positive');
  }
}

/**
 * Whether a ratio can be scored at all
 * @param ratio - Pile C:N ratio
 * @param config - Ratio configuration
 * @returns False for empty piles (0) and ratios above MAX_VALID_CN_RATIO
 */
export function isValidRatio(ratio: number, config: RatioConfig): boolean {
  return isFiniteNumber(ratio) && ratio > 0 && ratio <= config.MAX_VALID_CN_RATIO;
}

/**
 * Distance of a ratio from optimal
 */
export function getRatioDistance(ratio: number, config: RatioConfig): number {
  return Math.abs(ratio - config.OPTIMAL_CN_RATIO);
}
