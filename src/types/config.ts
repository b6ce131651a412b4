/**
 * Type definition for pH sensor configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * Exclusive millivolt window a buffer reading must fall into
 */
export interface VoltageWindow {
  readonly min: number;
  readonly max: number;
}

/**
 * User-configurable settings
 */
export interface PhSensorUserConfig {
  // ───────── CALIBRATION STORAGE ─────────
  readonly CALIBRATION_FILE_PATH: string;
  readonly CALIBRATION_MAKEDIRS: boolean;

  // ───────── READINGS ─────────
  readonly READING_DECIMALS: number;
  readonly TEMP_COMPENSATION_COEFFICIENT: number;
  readonly REFERENCE_TEMPERATURE_C: number;

  // ───────── LOGGING ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_LEVEL: LogLevel;
}

/**
 * Application constants
 * Probe and buffer characteristics that should rarely change
 */
export interface PhSensorAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── BUFFER SOLUTIONS ─────────
  readonly NEUTRAL_PH: number;
  readonly ACID_PH: number;

  // ───────── PROBE DEFAULTS ─────────
  readonly DEFAULT_NEUTRAL_VOLTAGE_MV: number;
  readonly DEFAULT_ACID_VOLTAGE_MV: number;
  readonly NEUTRAL_WINDOW_MV: VoltageWindow;
  readonly ACID_WINDOW_MV: VoltageWindow;
}

/**
 * Complete pH sensor configuration
 * Combines user config and app constants
 */
export type PhSensorConfig = PhSensorUserConfig & PhSensorAppConstants;
