/**
 * Calibration type definitions
 *
 * A two-point calibration maps probe millivolts onto pH with a straight line
 * through the readings taken in pH 4 and pH 7 buffer solution.
 */

import type { MillivoltReading, PhSensorAppConstants, PhValue } from '$types';

/**
 * A probe reading taken in a buffer of known pH
 */
export interface CalibrationPoint {
  readonly mv: MillivoltReading;
  readonly ph: PhValue;
}

/**
 * Active calibration line
 *
 * Invariant: slope is finite and non-zero, and slope/intercept describe
 * exactly the line through pointLow and pointHigh.
 */
export interface CalibrationRecord {
  readonly slope: number;
  readonly intercept: number;
  /** Acid (pH 4) buffer point */
  readonly pointLow: CalibrationPoint;
  /** Neutral (pH 7) buffer point */
  readonly pointHigh: CalibrationPoint;
}

/**
 * Line coefficients for pH = slope * mv + intercept
 */
export interface LineCoefficients {
  slope: number;
  intercept: number;
}

/**
 * Which buffer solution a reading belongs to
 */
export type BufferKind = 'neutral' | 'acid';

/**
 * Voltages of the active calibration, one per buffer
 */
export interface ActiveVoltages {
  neutralMv: number;
  acidMv: number;
}

/**
 * Constants the calibration math depends on
 */
export type CalibrationConstants = Pick<
  PhSensorAppConstants,
  | 'NEUTRAL_PH'
  | 'ACID_PH'
  | 'DEFAULT_NEUTRAL_VOLTAGE_MV'
  | 'DEFAULT_ACID_VOLTAGE_MV'
  | 'NEUTRAL_WINDOW_MV'
  | 'ACID_WINDOW_MV'
>;
