/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import type { ValidationError, ValidationWarning } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateBoolean(
  value: unknown,
  field: string,
  errors: ValidationError[]
): void {
  if (value !== undefined && typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails)
 * Recommended range violations produce warnings (validation passes)
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateNumberRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  // Check for NaN and Infinity (invalid numeric values)
  if (!isFiniteNumber(value)) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return;
  }

  // Check critical range
  if (value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return; // Don't check recommended if critical failed
  }

  // Check recommended range (only if provided)
  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
      );
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 *
 * First checks if the value is an integer, then validates ranges
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateIntegerRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  // Check if integer
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  // Validate range using the number validator
  validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}

// ═══════════════════════════════════════════════════════════════
// CROSS-FIELD VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that one setting lies strictly above another
 *
 * Skipped when either value is not finite; the range validators report those.
 *
 * @param lower - Value that must be smaller
 * @param lowerField - Field name of the smaller value
 * @param upper - Value that must be larger
 * @param upperField - Field name of the larger value (reported on failure)
 * @param errors - Array to append errors to
 */
export function validateOrdering(
  lower: number,
  lowerField: string,
  upper: number,
  upperField: string,
  errors: ValidationError[]
): void {
  if (!isFiniteNumber(lower) || !isFiniteNumber(upper)) return;

  if (upper <= lower) {
    addError(errors, upperField, `${upperField} must be greater than ${lowerField} (got ${upper} <= ${lower})`);
  }
}

/**
 * Validate that a setting lies within the closed range set by two others
 *
 * @param value - Value to check
 * @param field - Field name of the value
 * @param min - Lower bound
 * @param minField - Field name of the lower bound
 * @param max - Upper bound
 * @param maxField - Field name of the upper bound
 * @param errors - Array to append errors to
 */
export function validateBetweenFields(
  value: number,
  field: string,
  min: number,
  minField: string,
  max: number,
  maxField: string,
  errors: ValidationError[]
): void {
  if (!isFiniteNumber(value) || !isFiniteNumber(min) || !isFiniteNumber(max)) return;

  if (value < min || value > max) {
    addError(errors, field, `${field} must lie between ${minField} and ${maxField} (got ${value})`);
  }
}
