/**
 * Calibration file encoding
 */

import { createCalibrationRecord, getActiveVoltages } from '@core/calibration';
import { CalibrationFileError } from '$types/errors';
import { isFiniteNumber, nearlyEqual } from '@utils/number';

import type { CalibrationConstants, CalibrationRecord } from '@core/calibration';
import type { CalibrationFileContents } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encode a record as file contents
 * @param record - Calibration to store
 * @returns Pretty-printed JSON with trailing newline
 */
export function serializeCalibration(record: CalibrationRecord): string {
  const voltages = getActiveVoltages(record);
  const contents: CalibrationFileContents = {
    neutral_voltage: voltages.neutralMv,
    acid_voltage: voltages.acidMv,
    slope: record.slope,
    intercept: record.intercept
  };

  return JSON.stringify(contents, null, 2) + "\n";
}

/**
 * Check an optional stored coefficient against the recomputed one
 * @throws {CalibrationFileError} If present and not matching
 */
function checkCoefficient(field: string, stored: unknown, expected: number): void {
  if (stored === undefined) return;

  if (!isFiniteNumber(stored)) {
    throw new CalibrationFileError(field + " must be a finite number, got " + JSON.stringify(stored));
  }
  if (!nearlyEqual(stored, expected)) {
    throw new CalibrationFileError(
      field + " " + stored + " does not match the stored voltages (expected " + expected + ")"
    );
  }
}

/**
 * Decode file contents into a record
 *
 * @param text - Raw file contents
 * @param constants - Buffer pH values and voltage windows
 * @returns Calibration record rebuilt from the stored voltages
 * @throws {CalibrationFileError} If the contents are not a calibration file
 * @throws {CalibrationValidationError} If a stored voltage is out of range
 */
export function parseCalibrationFile(text: string, constants: CalibrationConstants): CalibrationRecord {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new CalibrationFileError(
      "Calibration data is not valid JSON: " + (err instanceof Error ? err.message : String(err)),
      { cause: err }
    );
  }

  if (!isRecord(data)) {
    throw new CalibrationFileError("Calibration data must be a JSON object");
  }

  const neutral = data['neutral_voltage'];
  const acid = data['acid_voltage'];

  if (!isFiniteNumber(neutral)) {
    throw new CalibrationFileError("neutral_voltage must be a finite number, got " + JSON.stringify(neutral));
  }
  if (!isFiniteNumber(acid)) {
    throw new CalibrationFileError("acid_voltage must be a finite number, got " + JSON.stringify(acid));
  }

  const record = createCalibrationRecord(neutral, acid, constants);

  checkCoefficient('slope', data['slope'], record.slope);
  checkCoefficient('intercept', data['intercept'], record.intercept);

  return record;
}
