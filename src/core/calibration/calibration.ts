/**
 * Two-point pH calibration
 *
 * ## Business Context
 * A glass pH electrode produces a voltage that is linear in pH over the
 * working range. Readings in two buffer solutions of known pH pin that line;
 * every later reading is converted by evaluating it.
 *
 * Records are immutable. Each calibration event builds a new record, so a
 * rejected calibration never disturbs the active one.
 */

import { CalibrationValidationError, InvalidInputError } from '$types/errors';
import { isFiniteNumber, nearlyEqual } from '@utils/number';

import {
  bufferLabel,
  isValidAcidVoltage,
  isValidNeutralVoltage,
  validateMillivolts,
  validateTemperature
} from './helpers';

import type {
  ActiveVoltages,
  BufferKind,
  CalibrationConstants,
  CalibrationPoint,
  CalibrationRecord,
  LineCoefficients
} from './types';

/**
 * Fit the line through two calibration points
 *
 * @param low - Acid buffer point
 * @param high - Neutral buffer point
 * @returns Slope and intercept of pH = slope * mv + intercept
 * @throws {CalibrationValidationError} If the points do not define a usable line
 */
export function fitLine(low: CalibrationPoint, high: CalibrationPoint): LineCoefficients {
  if (high.mv === low.mv) {
    throw new CalibrationValidationError(
      "Calibration voltages must differ, both are " + high.mv + " mV"
    );
  }

  const slope = (high.ph - low.ph) / (high.mv - low.mv);

  if (slope === 0 || !isFiniteNumber(slope)) {
    throw new CalibrationValidationError("Calibration slope must be finite and non-zero, got " + slope);
  }

  return {
    slope: slope,
    intercept: high.ph - slope * high.mv
  };
}

/**
 * Build a calibration record from buffer voltages
 *
 * @param neutralMv - Reading in pH 7 buffer
 * @param acidMv - Reading in pH 4 buffer
 * @param constants - Buffer pH values and voltage windows
 * @returns New calibration record
 * @throws {CalibrationValidationError} If a voltage lies outside its buffer window
 */
export function createCalibrationRecord(
  neutralMv: number,
  acidMv: number,
  constants: CalibrationConstants
): CalibrationRecord {
  if (!isValidNeutralVoltage(neutralMv, constants)) {
    throw new CalibrationValidationError(
      "The mV value " + neutralMv + " for " + bufferLabel('neutral', constants) + " is not valid"
    );
  }
  if (!isValidAcidVoltage(acidMv, constants)) {
    throw new CalibrationValidationError(
      "The mV value " + acidMv + " for " + bufferLabel('acid', constants) + " is not valid"
    );
  }

  const pointLow: CalibrationPoint = { mv: acidMv, ph: constants.ACID_PH };
  const pointHigh: CalibrationPoint = { mv: neutralMv, ph: constants.NEUTRAL_PH };
  const line = fitLine(pointLow, pointHigh);

  return {
    slope: line.slope,
    intercept: line.intercept,
    pointLow: pointLow,
    pointHigh: pointHigh
  };
}

/**
 * Check that a record satisfies the calibration invariants
 *
 * Rebuilds the record from its buffer voltages; the buffer pH values must
 * match the constants and slope/intercept must match the rebuilt line.
 *
 * @param record - Record to verify
 * @param constants - Buffer pH values and voltage windows
 * @returns The rebuilt record
 * @throws {CalibrationValidationError} If any invariant is violated
 */
export function verifyCalibrationRecord(
  record: CalibrationRecord,
  constants: CalibrationConstants
): CalibrationRecord {
  if (record.pointLow.ph !== constants.ACID_PH || record.pointHigh.ph !== constants.NEUTRAL_PH) {
    throw new CalibrationValidationError(
      "Calibration points must be at pH " + constants.ACID_PH + " and pH " + constants.NEUTRAL_PH +
      ", got pH " + record.pointLow.ph + " and pH " + record.pointHigh.ph
    );
  }

  const rebuilt = createCalibrationRecord(record.pointHigh.mv, record.pointLow.mv, constants);

  if (!nearlyEqual(record.slope, rebuilt.slope) || !nearlyEqual(record.intercept, rebuilt.intercept)) {
    throw new CalibrationValidationError(
      "Slope " + record.slope + " and intercept " + record.intercept +
      " do not match the calibration points (expected " + rebuilt.slope + " and " + rebuilt.intercept + ")"
    );
  }

  return rebuilt;
}

/**
 * Calibration of an uncalibrated probe
 */
export function createDefaultCalibration(constants: CalibrationConstants): CalibrationRecord {
  return createCalibrationRecord(
    constants.DEFAULT_NEUTRAL_VOLTAGE_MV,
    constants.DEFAULT_ACID_VOLTAGE_MV,
    constants
  );
}

/**
 * Replace the voltage of one buffer point
 *
 * @param record - Current calibration
 * @param kind - Buffer the new reading was taken in
 * @param mv - New reading
 * @param constants - Buffer pH values and voltage windows
 * @returns New calibration record
 * @throws {CalibrationValidationError} If the new voltage is outside its window
 */
export function withBufferVoltage(
  record: CalibrationRecord,
  kind: BufferKind,
  mv: number,
  constants: CalibrationConstants
): CalibrationRecord {
  const voltages = getActiveVoltages(record);

  return kind === 'neutral'
    ? createCalibrationRecord(mv, voltages.acidMv, constants)
    : createCalibrationRecord(voltages.neutralMv, mv, constants);
}

/**
 * Read back the buffer voltages of a record
 */
export function getActiveVoltages(record: CalibrationRecord): ActiveVoltages {
  return {
    neutralMv: record.pointHigh.mv,
    acidMv: record.pointLow.mv
  };
}

/**
 * Convert a reading with the calibration line
 *
 * @param record - Active calibration
 * @param mv - Probe reading
 * @returns Unrounded pH value
 * @throws {InvalidInputError} If mv is not a finite number
 */
export function applyCalibration(record: CalibrationRecord, mv: number): number {
  validateMillivolts(mv, 'applyCalibration');
  return record.slope * mv + record.intercept;
}

/**
 * Correct a reading for probe temperature
 *
 * The probe's output scales by (1 + coefficient * (T - Tref)); dividing it
 * out gives the voltage the probe would show at the reference temperature.
 *
 * @param mv - Probe reading
 * @param temperatureC - Sample temperature in °C
 * @param coefficient - Fractional drift per °C
 * @param referenceC - Temperature the calibration applies to
 * @returns Compensated millivolt value
 * @throws {InvalidInputError} If an input is not finite or the correction factor is not positive
 */
export function compensateTemperature(
  mv: number,
  temperatureC: number,
  coefficient: number,
  referenceC: number
): number {
  validateMillivolts(mv, 'compensateTemperature');
  validateTemperature(temperatureC, 'compensateTemperature');
  if (!isFiniteNumber(coefficient)) {
    throw new InvalidInputError(
      "compensateTemperature: coefficient must be a finite number, got " + String(coefficient),
      coefficient
    );
  }

  const factor = 1.0 + coefficient * (temperatureC - referenceC);
  if (factor <= 0) {
    throw new InvalidInputError(
      "compensateTemperature: " + temperatureC + "C is outside the range coefficient " + coefficient + " can correct"
    );
  }

  return mv / factor;
}
