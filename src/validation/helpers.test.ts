/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  createReport,
  toResult,
  validateBoolean,
  validateLogLevel,
  validateNonEmptyString,
  validateRange
} from './helpers';

import type { ValidationReport } from './types';

describe('Validation Helpers', () => {
  let report: ValidationReport;

  beforeEach(() => {
    report = createReport();
  });

  describe('addError / addWarning', () => {
    it('should add error with CRITICAL level', () => {
      addError(report, 'CALIBRATION_FILE_PATH', 'Value missing');

      expect(report.errors).toEqual([{
        level: 'CRITICAL',
        field: 'CALIBRATION_FILE_PATH',
        message: 'Value missing'
      }]);
    });

    it('should add warning with WARNING level', () => {
      addWarning(report, 'READING_DECIMALS', 'Outside recommended range');

      expect(report.warnings).toEqual([{
        level: 'WARNING',
        field: 'READING_DECIMALS',
        message: 'Outside recommended range'
      }]);
    });
  });

  describe('toResult', () => {
    it('should stay valid with warnings only', () => {
      addWarning(report, 'FIELD', 'Hmm');

      expect(toResult(report).valid).toBe(true);
    });

    it('should be invalid once an error is added', () => {
      addError(report, 'FIELD', 'Bad');

      const result = toResult(report);

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
    });
  });

  describe('validateBoolean', () => {
    it('should accept booleans and undefined', () => {
      validateBoolean(true, 'FLAG', report);
      validateBoolean(false, 'FLAG', report);
      validateBoolean(undefined, 'FLAG', report);

      expect(report.errors).toHaveLength(0);
    });

    it('should reject non-booleans', () => {
      validateBoolean('true', 'FLAG', report);

      expect(report.errors[0].message).toBe('FLAG must be a boolean (got string)');
    });
  });

  describe('validateNonEmptyString', () => {
    it('should reject blank strings and non-strings', () => {
      validateNonEmptyString('   ', 'PATH', report);
      validateNonEmptyString(42, 'PATH', report);

      expect(report.errors).toHaveLength(2);
      expect(report.errors[0].message).toBe('PATH must be a non-empty string');
    });

    it('should accept a path', () => {
      validateNonEmptyString('data/ph.json', 'PATH', report);

      expect(report.errors).toHaveLength(0);
    });
  });

  describe('validateLogLevel', () => {
    it('should accept 0-3', () => {
      validateLogLevel(0, 'LEVEL', report);
      validateLogLevel(3, 'LEVEL', report);

      expect(report.errors).toHaveLength(0);
    });

    it('should reject other values', () => {
      validateLogLevel(7, 'LEVEL', report);

      expect(report.errors[0].message).toBe('LEVEL must be one of 0, 1, 2, 3 (got 7)');
    });
  });

  describe('validateRange', () => {
    const range = { min: 0, max: 10, recommended: { min: 2, max: 8 } };

    it('should skip undefined', () => {
      validateRange(undefined, 'VALUE', range, report);

      expect(report).toEqual({ errors: [], warnings: [] });
    });

    it('should error outside the critical range without warning', () => {
      validateRange(11, 'VALUE', range, report);

      expect(report.errors[0].message).toBe('VALUE must be between 0 and 10 (got 11)');
      expect(report.warnings).toHaveLength(0);
    });

    it('should error on NaN', () => {
      validateRange(NaN, 'VALUE', { min: 0, max: 10 }, report);

      expect(report.errors[0].message).toBe('VALUE must be between 0 and 10 (got NaN)');
    });

    it('should warn outside the recommended range', () => {
      validateRange(9, 'VALUE', range, report);

      expect(report.errors).toHaveLength(0);
      expect(report.warnings[0].message).toBe('VALUE is outside recommended range 2-8 (got 9)');
    });

    it('should accept inclusive boundaries', () => {
      validateRange(0, 'VALUE', { min: 0, max: 10 }, report);
      validateRange(10, 'VALUE', { min: 0, max: 10 }, report);
      validateRange(2, 'VALUE', range, report);

      expect(report).toEqual({ errors: [], warnings: [] });
    });

    it('should reject fractions when an integer is required', () => {
      validateRange(2.5, 'DECIMALS', { min: 0, max: 6, integer: true }, report);

      expect(report.errors[0].message).toBe('DECIMALS must be an integer (got 2.5)');
    });

    it('should range-check integers', () => {
      validateRange(7, 'DECIMALS', { min: 0, max: 6, integer: true }, report);

      expect(report.errors[0].message).toBe('DECIMALS must be between 0 and 6 (got 7)');
    });
  });
});
