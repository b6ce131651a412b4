/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, toLogLevel, fmtMv, fmtPh } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should format DEBUG level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
  });

  test('should format INFO level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('ℹ️ [INFO]     test message');
  });

  test('should format WARNING level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('⚠️ [WARNING]  test message');
  });

  test('should format CRITICAL level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('🚨 [CRITICAL] test message');
  });

  test('should handle empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('ℹ️ [INFO]     ');
  });
});

describe('shouldLog', () => {
  test('should pass messages at or above the current level', () => {
    expect(shouldLog(LOG_LEVELS.INFO, LOG_LEVELS.INFO)).toBe(true);
    expect(shouldLog(LOG_LEVELS.CRITICAL, LOG_LEVELS.INFO)).toBe(true);
  });

  test('should suppress messages below the current level', () => {
    expect(shouldLog(LOG_LEVELS.DEBUG, LOG_LEVELS.INFO)).toBe(false);
  });
});

describe('toLogLevel', () => {
  test('should accept 0-3', () => {
    expect(toLogLevel(0)).toBe(0);
    expect(toLogLevel(3)).toBe(3);
  });

  test('should reject anything else', () => {
    expect(toLogLevel(4)).toBeNull();
    expect(toLogLevel(-1)).toBeNull();
    expect(toLogLevel(1.5)).toBeNull();
  });
});

describe('fmtMv / fmtPh', () => {
  test('should format millivolts', () => {
    expect(fmtMv(1500)).toBe('1500 mV');
    expect(fmtMv(2032.44)).toBe('2032.44 mV');
  });

  test('should format pH with fixed decimals', () => {
    expect(fmtPh(7, 2)).toBe('pH 7.00');
    expect(fmtPh(null, 2)).toBe('pH n/a');
  });
});
