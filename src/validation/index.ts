export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateNumberRange,
  validateIntegerRange,
  validateOrdering,
  validateBetweenFields
} from './helpers';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';
