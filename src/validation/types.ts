/**
 * Configuration validation types
 *
 * These describe config problems, not thrown errors. Thrown errors live in $types/errors.
 */

/** Severity attached to a reported config problem */
export type ValidationSeverity = 'CRITICAL' | 'WARNING';

/** Setting that prevents startup */
export interface ValidationError {
  field: string;
  message: string;
  level: ValidationSeverity;
}

/** Setting that works but sits outside the recommended range */
export interface ValidationWarning {
  field: string;
  message: string;
  level: ValidationSeverity;
}

/** Problems collected while validating */
export interface ValidationReport {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationResult extends ValidationReport {
  valid: boolean;
}

/**
 * Limits of a numeric setting
 */
export interface NumberRange {
  min: number;
  max: number;
  /** Require a whole number */
  integer?: boolean;
  recommended?: {
    min: number;
    max: number;
  };
}
