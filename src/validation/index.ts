export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  createReport,
  toResult,
  validateBoolean,
  validateNonEmptyString,
  validateLogLevel,
  validateRange
} from './helpers';
export type {
  NumberRange,
  ValidationError,
  ValidationReport,
  ValidationResult,
  ValidationSeverity,
  ValidationWarning
} from './types';
