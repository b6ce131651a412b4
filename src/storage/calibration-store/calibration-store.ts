/**
 * Calibration persistence
 *
 * Stores the active calibration as a small JSON file. A missing file means
 * the probe was never calibrated; a malformed one is treated the same way
 * and reported at WARNING level. Only read errors other than absence escape.
 *
 * Writes go to a sibling temp file which is then renamed over the target,
 * so a crash mid-write leaves the previous calibration intact.
 */

import * as path from 'path';

import { createDefaultCalibration, verifyCalibrationRecord } from '@core/calibration';
import { fmtMv } from '@logging';
import { CalibrationStorageError, ValidationError } from '$types/errors';

import { parseCalibrationFile, serializeCalibration } from './helpers';

import type { CalibrationConstants, CalibrationRecord } from '@core/calibration';
import type { CalibrationStore, CalibrationStoreConfig, CalibrationStoreDependencies } from './types';

/**
 * Create a calibration store
 *
 * @param config - File location and directory creation policy
 * @param dependencies - File system and logger
 * @param constants - Buffer pH values, default voltages and windows
 * @returns Calibration store instance
 *
 * @example
 * ```typescript
 * const store = createCalibrationStore(
 *   { filePath: 'data/ph_calibration_data.json', makedirs: true },
 *   { fs: nodeFileSystem, logger: logger },
 *   APP_CONSTANTS
 * );
 * const record = store.load();
 * ```
 */
export function createCalibrationStore(
  config: CalibrationStoreConfig,
  dependencies: CalibrationStoreDependencies,
  constants: CalibrationConstants
): CalibrationStore {
  const fs = dependencies.fs;
  const logger = dependencies.logger;
  const filePath = config.filePath;

  function exists(): boolean {
    return fs.existsSync(filePath);
  }

  function load(): CalibrationRecord {
    if (!exists()) {
      logger.info("No calibration data at " + filePath + ", using defaults");
      return createDefaultCalibration(constants);
    }

    logger.info("Loading calibration data from " + filePath + "...");
    const text = fs.readFileSync(filePath, 'utf8');

    try {
      return parseCalibrationFile(text, constants);
    } catch (err) {
      if (err instanceof ValidationError) {
        logger.warning("Ignoring calibration data in " + filePath + ": " + err.message + ". Using defaults");
        return createDefaultCalibration(constants);
      }
      throw err;
    }
  }

  /**
   * Make sure the target directory exists
   * @throws {CalibrationStorageError} If it is missing and makedirs is off
   */
  function ensureDirectory(): void {
    const folder = path.dirname(path.resolve(filePath));
    if (fs.existsSync(folder)) {
      return;
    }

    if (!config.makedirs) {
      throw new CalibrationStorageError(folder);
    }

    fs.mkdirSync(folder, { recursive: true });
    logger.debug("Created directory " + folder);
  }

  function save(record: CalibrationRecord): void {
    const verified = verifyCalibrationRecord(record, constants);
    ensureDirectory();

    logger.info("Storing calibration data in " + filePath + "...");
    const tmpPath = filePath + ".tmp";
    fs.writeFileSync(tmpPath, serializeCalibration(verified), 'utf8');
    try {
      fs.renameSync(tmpPath, filePath);
    } catch (err) {
      // Target keeps its previous contents; drop the orphaned temp file
      if (fs.existsSync(tmpPath)) {
        fs.unlinkSync(tmpPath);
      }
      throw err;
    }
    logger.debug(
      "Stored neutral " + fmtMv(verified.pointHigh.mv) + ", acid " + fmtMv(verified.pointLow.mv)
    );
  }

  function getPath(): string {
    return filePath;
  }

  return {
    load: load,
    save: save,
    exists: exists,
    getPath: getPath
  };
}
