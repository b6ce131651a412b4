import {
  addError,
  createReport,
  toResult,
  validateBoolean,
  validateLogLevel,
  validateNonEmptyString,
  validateRange
} from './helpers';

import type { PhSensorAppConstants, PhSensorUserConfig } from '$types';
import type { NumberRange, ValidationResult } from './types';

const READING_DECIMALS_RANGE: NumberRange = { min: 0, max: 6, integer: true, recommended: { min: 1, max: 3 } };
const TEMP_COEFFICIENT_RANGE: NumberRange = { min: 0, max: 0.1, recommended: { min: 0.005, max: 0.03 } };
const REFERENCE_TEMPERATURE_RANGE: NumberRange = { min: 0, max: 50, recommended: { min: 20, max: 25 } };

export function validateConfig(
  config: PhSensorUserConfig,
  constants: PhSensorAppConstants
): ValidationResult {
  const report = createReport();

  // Calibration storage
  validateNonEmptyString(config.CALIBRATION_FILE_PATH, 'CALIBRATION_FILE_PATH', report);
  validateBoolean(config.CALIBRATION_MAKEDIRS, 'CALIBRATION_MAKEDIRS', report);

  // Readings
  validateRange(config.READING_DECIMALS, 'READING_DECIMALS', READING_DECIMALS_RANGE, report);
  validateRange(config.TEMP_COMPENSATION_COEFFICIENT, 'TEMP_COMPENSATION_COEFFICIENT', TEMP_COEFFICIENT_RANGE, report);
  validateRange(config.REFERENCE_TEMPERATURE_C, 'REFERENCE_TEMPERATURE_C', REFERENCE_TEMPERATURE_RANGE, report);

  // Logging
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', report);
  validateLogLevel(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', report);
  validateLogLevel(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', report);

  // Probe constants must leave room for a usable line
  if (constants.NEUTRAL_WINDOW_MV.max >= constants.ACID_WINDOW_MV.min) {
    addError(report, 'NEUTRAL_WINDOW_MV', 'Must not overlap ACID_WINDOW_MV');
  }

  return toResult(report);
}
