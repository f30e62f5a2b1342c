/**
 * Global error types for the compost simulation
 * Raised only while validating configuration, never from a running pile
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the merged configuration fails validation
 * Carries every failing field so callers can report them together
 */
export class ConfigValidationError extends ValidationError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}

/**
 * Error thrown when carbon:nitrogen ratio settings are invalid
 */
export class RatioConfigValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'RatioConfigValidationError';
  }
}

/**
 * Error thrown when material store settings are invalid
 */
export class MaterialStoreValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'MaterialStoreValidationError';
  }
}
