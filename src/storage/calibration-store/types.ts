/**
 * Calibration store type definitions
 */

import type { CalibrationRecord } from '@core/calibration';
import type { Logger } from '@logging';

/**
 * Synchronous file system calls used by the store
 * Abstraction over node:fs for testability
 */
export interface FileSystemAPI {
  existsSync(path: string): boolean;
  readFileSync(path: string, encoding: 'utf8'): string;
  writeFileSync(path: string, data: string, encoding: 'utf8'): void;
  renameSync(oldPath: string, newPath: string): void;
  unlinkSync(path: string): void;
  mkdirSync(path: string, options: { recursive: true }): void;
}

/**
 * Calibration store configuration
 */
export interface CalibrationStoreConfig {
  /** JSON file holding the calibration */
  filePath: string;
  /** Create missing parent directories on save */
  makedirs: boolean;
}

/**
 * Calibration store external dependencies
 */
export interface CalibrationStoreDependencies {
  fs: FileSystemAPI;
  logger: Logger;
}

/**
 * Persistent calibration record
 */
export interface CalibrationStore {
  /** Read the stored record; defaults when the file is missing or malformed */
  load(): CalibrationRecord;
  /** Replace the stored record */
  save(record: CalibrationRecord): void;
  /** Whether a calibration file is present */
  exists(): boolean;
  /** Location of the calibration file */
  getPath(): string;
}

/**
 * On-disk layout of the calibration file
 * slope and intercept are absent in files written by older tools
 */
export interface CalibrationFileContents {
  neutral_voltage: number;
  acid_voltage: number;
  slope?: number;
  intercept?: number;
}
