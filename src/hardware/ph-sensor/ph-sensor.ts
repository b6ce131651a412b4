/**
 * Calibrated pH probe
 *
 * Holds the active calibration record in memory and writes every change
 * through the calibration store. The record is replaced only after the
 * store accepted the new one.
 */

import {
  applyCalibration,
  bufferLabel,
  compensateTemperature,
  createCalibrationRecord,
  createDefaultCalibration,
  detectBuffer,
  getActiveVoltages,
  validateDecimals,
  validateMillivolts,
  withBufferVoltage
} from '@core/calibration';
import { fmtMv } from '@logging';
import { CalibrationValidationError } from '$types/errors';
import { roundTo } from '@utils/number';

import type { BufferKind, CalibrationConstants, CalibrationRecord } from '@core/calibration';
import type { PhSensor, PhSensorDependencies, PhSensorSettings } from './types';

/**
 * Create a pH sensor
 *
 * On first run (no calibration file) the default calibration is written so
 * the file always reflects the active voltages.
 *
 * @param settings - Reading defaults
 * @param dependencies - Calibration store and logger
 * @param constants - Buffer pH values, default voltages and windows
 * @returns pH sensor instance
 *
 * @example
 * ```typescript
 * const sensor = createPhSensor(
 *   { decimals: 2, tempCoefficient: 0.01, referenceTemperatureC: 25 },
 *   { store: store, logger: logger },
 *   APP_CONSTANTS
 * );
 * sensor.readPh(1515);        // 6.92
 * sensor.autoCalibrate(1515); // 'neutral'
 * sensor.readPh(1515);        // 7
 * ```
 */
export function createPhSensor(
  settings: PhSensorSettings,
  dependencies: PhSensorDependencies,
  constants: CalibrationConstants
): PhSensor {
  const store = dependencies.store;
  const logger = dependencies.logger;
  let record: CalibrationRecord;

  if (store.exists()) {
    record = store.load();
  } else {
    record = createDefaultCalibration(constants);
    store.save(record);
  }
  logActiveVoltages();

  function logActiveVoltages(): void {
    const voltages = getActiveVoltages(record);
    logger.info("Active neutral voltage for pH " + constants.NEUTRAL_PH + ": " + fmtMv(voltages.neutralMv));
    logger.info("Active acid voltage for pH " + constants.ACID_PH + ": " + fmtMv(voltages.acidMv));
  }

  /**
   * Persist a new record, then make it active
   */
  function commit(next: CalibrationRecord): void {
    store.save(next);
    record = next;
  }

  function readPh(mv: number, decimals?: number): number {
    validateMillivolts(mv, 'readPh');
    const places = decimals ?? settings.decimals;
    validateDecimals(places, 'readPh');
    return roundTo(applyCalibration(record, mv), places);
  }

  function readPhTemperatureCompensated(
    mv: number,
    temperatureC: number,
    coefficient?: number,
    decimals?: number
  ): number {
    const places = decimals ?? settings.decimals;
    validateDecimals(places, 'readPhTemperatureCompensated');
    const compensated = compensateTemperature(
      mv,
      temperatureC,
      coefficient ?? settings.tempCoefficient,
      settings.referenceTemperatureC
    );
    return roundTo(applyCalibration(record, compensated), places);
  }

  function calibrateBuffer(kind: BufferKind, mv: number): void {
    validateMillivolts(mv, 'calibrate');
    commit(withBufferVoltage(record, kind, mv, constants));
    logger.info("Successfully calibrated " + bufferLabel(kind, constants) + " voltage to " + fmtMv(mv));
  }

  function autoCalibrate(mv: number): BufferKind {
    validateMillivolts(mv, 'autoCalibrate');

    const kind = detectBuffer(mv, constants);
    if (kind === null) {
      throw new CalibrationValidationError(
        "Auto calibration does not work for " + mv + " mV. Use a designated calibration method."
      );
    }

    calibrateBuffer(kind, mv);
    return kind;
  }

  function calibratePh7(mv: number): void {
    calibrateBuffer('neutral', mv);
  }

  function calibratePh4(mv: number): void {
    calibrateBuffer('acid', mv);
  }

  function resetToDefault(): void {
    commit(createDefaultCalibration(constants));
    logActiveVoltages();
  }

  function setCalibrationData(neutralMv: number, acidMv: number): void {
    validateMillivolts(neutralMv, 'setCalibrationData');
    validateMillivolts(acidMv, 'setCalibrationData');
    commit(createCalibrationRecord(neutralMv, acidMv, constants));
    logActiveVoltages();
  }

  function getCalibration(): CalibrationRecord {
    return record;
  }

  return {
    readPh: readPh,
    readPhTemperatureCompensated: readPhTemperatureCompensated,
    autoCalibrate: autoCalibrate,
    calibratePh7: calibratePh7,
    calibratePh4: calibratePh4,
    resetToDefault: resetToDefault,
    setCalibrationData: setCalibrationData,
    getCalibration: getCalibration,
    getActiveVoltages: function() {
      return getActiveVoltages(record);
    }
  };
}
