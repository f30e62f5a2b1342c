/**
 * Configuration validator
 *
 * Critical ranges produce errors and make the config unusable. Recommended
 * ranges produce warnings only.
 */

import { validateRatioConfig } from '@core/material-ratio';
import { validateMaterialStoreConfig } from '@features/material-store';
import type { CompostConfig } from '$types';
import { ValidationError as ModuleValidationError } from '$types/errors';

import {
  addError,
  validateBetweenFields,
  validateBoolean,
  validateIntegerRange,
  validateNumberRange,
  validateOrdering
} from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

/**
 * Validate a complete compost configuration
 *
 * @param config - Merged USER_CONFIG and APP_CONSTANTS
 * @returns Validation result with every error and warning found
 *
 * @example
 * ```typescript
 * const result = validateConfig(resolveConfig({ HOURS_TO_COMPLETE: 0 }));
 * result.valid;           // false
 * result.errors[0].field; // 'HOURS_TO_COMPLETE'
 * ```
 */
export function validateConfig(config: CompostConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // ═══════════════════════════════════════════════════════════════
  // CAPACITY
  // ═══════════════════════════════════════════════════════════════

  validateIntegerRange(config.MAX_CAPACITY, 'MAX_CAPACITY', 1, 1024, errors, warnings, 16, 256);
  validateIntegerRange(
    config.BULK_ADD_AMOUNT, 'BULK_ADD_AMOUNT', 1, Math.max(1, config.MAX_CAPACITY), errors, warnings, 1, 8
  );

  // ═══════════════════════════════════════════════════════════════
  // TIMING
  // ═══════════════════════════════════════════════════════════════

  validateNumberRange(config.HOURS_TO_COMPLETE, 'HOURS_TO_COMPLETE', 1, 10000, errors, warnings, 120, 480);
  validateNumberRange(
    config.TURN_SPEEDUP_HOURS, 'TURN_SPEEDUP_HOURS', 0, Math.max(0, config.HOURS_TO_COMPLETE), errors, warnings, 2, 12
  );
  validateNumberRange(config.TURN_COOLDOWN_HOURS, 'TURN_COOLDOWN_HOURS', 0, 240, errors, warnings, 4, 24);
  validateNumberRange(config.OUTPUT_PER_ITEM, 'OUTPUT_PER_ITEM', 0, 10, errors, warnings, 0.25, 1);

  // ═══════════════════════════════════════════════════════════════
  // CARBON:NITROGEN
  // ═══════════════════════════════════════════════════════════════

  validateNumberRange(config.GREEN_CN_RATIO, 'GREEN_CN_RATIO', 1, 100, errors, warnings, 10, 25);
  validateNumberRange(config.BROWN_CN_RATIO, 'BROWN_CN_RATIO', 1, 100, errors, warnings, 40, 100);
  validateOrdering(config.GREEN_CN_RATIO, 'GREEN_CN_RATIO', config.BROWN_CN_RATIO, 'BROWN_CN_RATIO', errors);

  validateNumberRange(config.OPTIMAL_CN_RATIO, 'OPTIMAL_CN_RATIO', 1, 100, errors, warnings, 25, 30);
  validateBetweenFields(
    config.OPTIMAL_CN_RATIO, 'OPTIMAL_CN_RATIO',
    config.GREEN_CN_RATIO, 'GREEN_CN_RATIO',
    config.BROWN_CN_RATIO, 'BROWN_CN_RATIO',
    errors
  );

  validateNumberRange(config.OPTIMAL_RATIO_BONUS, 'OPTIMAL_RATIO_BONUS', 1, 5, errors, warnings, 1.2, 2);
  validateNumberRange(config.POOR_RATIO_PENALTY, 'POOR_RATIO_PENALTY', 0.01, 1, errors, warnings, 0.3, 0.8);

  if (config.MAX_VALID_CN_RATIO < config.BROWN_CN_RATIO) {
    addError(errors, 'MAX_VALID_CN_RATIO', 'MAX_VALID_CN_RATIO must not be below BROWN_CN_RATIO');
  }

  // ═══════════════════════════════════════════════════════════════
  // MOISTURE ACTIONS
  // ═══════════════════════════════════════════════════════════════

  validateNumberRange(config.WATER_AMOUNT, 'WATER_AMOUNT', 0.01, 1, errors, warnings, 0.1, 0.3);
  validateNumberRange(config.DRY_MATERIAL_AMOUNT, 'DRY_MATERIAL_AMOUNT', 0.01, 1, errors, warnings, 0.1, 0.3);

  // ═══════════════════════════════════════════════════════════════
  // SIMULATION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  validateIntegerRange(config.REMAINING_HOURS_SENTINEL, 'REMAINING_HOURS_SENTINEL', 1, 1000000, errors, warnings);
  validateNumberRange(config.SMALL_PILE_FILL_RATIO, 'SMALL_PILE_FILL_RATIO', 0.01, 1, errors, warnings);
  validateNumberRange(config.TURN_WET_DRYING, 'TURN_WET_DRYING', 0, 1, errors, warnings);
  validateNumberRange(config.TURN_DAMP_DRYING, 'TURN_DAMP_DRYING', 0, 1, errors, warnings);
  validateNumberRange(config.TURN_DAMP_THRESHOLD, 'TURN_DAMP_THRESHOLD', 0, 1, errors, warnings);

  // ═══════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════

  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateIntegerRange(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', 0, 3, errors, warnings);
  validateIntegerRange(config.CONSOLE_BUFFER_SIZE, 'CONSOLE_BUFFER_SIZE', 10, 1000, errors, warnings, 100, 300);
  validateIntegerRange(config.CONSOLE_INTERVAL_MS, 'CONSOLE_INTERVAL_MS', 1, 200, errors, warnings, 5, 50);
  validateIntegerRange(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', 0, 3, errors, warnings);
  validateNumberRange(
    config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', 0, 720, errors, warnings
  );

  // Module checks only run on numerically sound configs, so one bad value
  // is reported once
  if (errors.length === 0) {
    runModuleCheck('MATERIAL_LISTS', errors, () => validateMaterialStoreConfig(config));
    runModuleCheck('CN_RATIOS', errors, () => validateRatioConfig(config));
  }

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}

/**
 * Run a throwing module validator and record its failure as an error
 */
function runModuleCheck(field: string, errors: ValidationError[], check: () => void): void {
  try {
    check();
  } catch (err) {
    if (err instanceof ModuleValidationError) {
      addError(errors, field, err.message);
      return;
    }
    throw err;
  }
}
