/**
 * pH sensor type definitions
 */

import type { ActiveVoltages, BufferKind, CalibrationRecord } from '@core/calibration';
import type { Logger } from '@logging';
import type { CalibrationStore } from '@storage/calibration-store';
import type { MillivoltReading, PhValue } from '$types';

/**
 * Reading configuration
 */
export interface PhSensorSettings {
  /** Default decimal places of reported pH values */
  decimals: number;
  /** Default fractional drift per °C for temperature compensation */
  tempCoefficient: number;
  /** Temperature (°C) the calibration applies to */
  referenceTemperatureC: number;
}

/**
 * pH sensor external dependencies
 */
export interface PhSensorDependencies {
  store: CalibrationStore;
  logger: Logger;
}

/**
 * Calibrated pH probe
 */
export interface PhSensor {
  /** Convert a reading to pH */
  readPh(mv: MillivoltReading, decimals?: number): PhValue;
  /** Convert a reading taken at the given temperature to pH */
  readPhTemperatureCompensated(
    mv: MillivoltReading,
    temperatureC: number,
    coefficient?: number,
    decimals?: number
  ): PhValue;
  /** Calibrate the buffer point the reading falls into and persist it */
  autoCalibrate(mv: MillivoltReading): BufferKind;
  /** Calibrate the pH 7 point and persist it */
  calibratePh7(mv: MillivoltReading): void;
  /** Calibrate the pH 4 point and persist it */
  calibratePh4(mv: MillivoltReading): void;
  /** Restore and persist the default calibration */
  resetToDefault(): void;
  /** Set and persist both buffer voltages */
  setCalibrationData(neutralMv: MillivoltReading, acidMv: MillivoltReading): void;
  /** Active calibration record */
  getCalibration(): CalibrationRecord;
  /** Active buffer voltages */
  getActiveVoltages(): ActiveVoltages;
}
