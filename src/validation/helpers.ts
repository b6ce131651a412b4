/**
 * Validation helper functions
 *
 * Every validator appends to a shared report instead of returning early, so
 * one pass lists every problem in the configuration.
 */

import { toLogLevel } from '@logging';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { NumberRange, ValidationReport, ValidationResult } from './types';

/**
 * Create an empty report
 */
export function createReport(): ValidationReport {
  return { errors: [], warnings: [] };
}

/**
 * Close a report; it is valid when no errors were added
 */
export function toResult(report: ValidationReport): ValidationResult {
  return {
    valid: report.errors.length === 0,
    errors: report.errors,
    warnings: report.warnings
  };
}

export function addError(report: ValidationReport, field: string, message: string): void {
  report.errors.push({ level: 'CRITICAL', field: field, message: message });
}

export function addWarning(report: ValidationReport, field: string, message: string): void {
  report.warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean (undefined is skipped)
 */
export function validateBoolean(value: unknown, field: string, report: ValidationReport): void {
  if (value !== undefined && typeof value !== 'boolean') {
    addError(report, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

export function validateNonEmptyString(value: unknown, field: string, report: ValidationReport): void {
  if (typeof value !== 'string' || value.trim() === '') {
    addError(report, field, `${field} must be a non-empty string`);
  }
}

/**
 * Validate that a value is one of the LOG_LEVELS values
 */
export function validateLogLevel(value: unknown, field: string, report: ValidationReport): void {
  if (!isFiniteNumber(value) || toLogLevel(value) === null) {
    addError(report, field, `${field} must be one of 0, 1, 2, 3 (got ${String(value)})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATOR
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against its critical and recommended ranges
 *
 * Outside [min, max] (or not an integer when one is required) is an error.
 * Outside the recommended range is only a warning. Both ranges are inclusive.
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for messages
 * @param range - Limits for this field
 * @param report - Report to append to
 *
 * @example
 * ```typescript
 * validateRange(config.READING_DECIMALS, 'READING_DECIMALS',
 *   { min: 0, max: 6, integer: true, recommended: { min: 1, max: 3 } }, report);
 * ```
 */
export function validateRange(
  value: number | undefined,
  field: string,
  range: NumberRange,
  report: ValidationReport
): void {
  if (value === undefined) return;

  if (range.integer && !isInteger(value)) {
    addError(report, field, `${field} must be an integer (got ${value})`);
    return;
  }

  // NaN and Infinity fail the same way as out-of-range values
  if (!isFiniteNumber(value) || value < range.min || value > range.max) {
    addError(report, field, `${field} must be between ${range.min} and ${range.max} (got ${value})`);
    return;
  }

  const recommended = range.recommended;
  if (recommended && (value < recommended.min || value > recommended.max)) {
    addWarning(
      report,
      field,
      `${field} is outside recommended range ${recommended.min}-${recommended.max} (got ${value})`
    );
  }
}
