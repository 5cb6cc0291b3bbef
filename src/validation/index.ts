export { validateConfig, CONFIG_LIMITS } from './validator';
export {
  addError,
  addWarning,
  describeValue,
  validateMapping,
  validateNonEmptyString,
  validateNumberRange,
  validateIntegerRange
} from './helpers';
export type { ValidationError, ValidationWarning, ValidationResult, ConfigValidationResult } from './types';
