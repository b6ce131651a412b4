/**
 * Calibration helper functions
 */

import { InvalidInputError } from '$types/errors';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { VoltageWindow } from '$types';
import type { BufferKind, CalibrationConstants } from './types';

/**
 * Validate a millivolt input
 * @param value - Value to validate
 * @param context - Calling operation, used as message prefix
 * @throws {InvalidInputError} If value is not a finite number
 */
export function validateMillivolts(value: unknown, context: string): asserts value is number {
  if (!isFiniteNumber(value)) {
    throw new InvalidInputError(context + ": millivolt reading must be a finite number, got " + String(value), value);
  }
}

/**
 * Validate a temperature input
 * @param value - Value to validate
 * @param context - Calling operation, used as message prefix
 * @throws {InvalidInputError} If value is not a finite number
 */
export function validateTemperature(value: unknown, context: string): asserts value is number {
  if (!isFiniteNumber(value)) {
    throw new InvalidInputError(context + ": temperature must be a finite number, got " + String(value), value);
  }
}

/** Largest rounding precision a reading accepts */
export const MAX_READING_DECIMALS = 6;

/**
 * Validate a rounding precision
 * @param value - Number of decimal places
 * @param context - Calling operation, used as message prefix
 * @throws {InvalidInputError} If value is not an integer from 0 to MAX_READING_DECIMALS
 */
export function validateDecimals(value: unknown, context: string): asserts value is number {
  if (!isFiniteNumber(value) || !isInteger(value) || value < 0 || value > MAX_READING_DECIMALS) {
    throw new InvalidInputError(
      context + ": decimals must be an integer from 0 to " + MAX_READING_DECIMALS + ", got " + String(value),
      value
    );
  }
}

/**
 * Check if a reading lies strictly inside a voltage window
 * @param mv - Millivolt reading
 * @param window - Exclusive bounds
 * @returns True if min < mv < max
 */
export function isWithinWindow(mv: number, window: VoltageWindow): boolean {
  return isFiniteNumber(mv) && mv > window.min && mv < window.max;
}

/**
 * Check if a reading is plausible for pH 7 buffer
 */
export function isValidNeutralVoltage(mv: number, constants: CalibrationConstants): boolean {
  return isWithinWindow(mv, constants.NEUTRAL_WINDOW_MV);
}

/**
 * Check if a reading is plausible for pH 4 buffer
 */
export function isValidAcidVoltage(mv: number, constants: CalibrationConstants): boolean {
  return isWithinWindow(mv, constants.ACID_WINDOW_MV);
}

/**
 * Identify the buffer solution a reading was taken in
 * @param mv - Millivolt reading
 * @param constants - Buffer windows
 * @returns Buffer kind, or null when the reading fits neither window
 */
export function detectBuffer(mv: number, constants: CalibrationConstants): BufferKind | null {
  if (isValidNeutralVoltage(mv, constants)) return 'neutral';
  if (isValidAcidVoltage(mv, constants)) return 'acid';
  return null;
}

/**
 * Human-readable buffer label for log and error messages
 */
export function bufferLabel(kind: BufferKind, constants: CalibrationConstants): string {
  return kind === 'neutral'
    ? "neutral pH " + constants.NEUTRAL_PH
    : "acid pH " + constants.ACID_PH;
}
