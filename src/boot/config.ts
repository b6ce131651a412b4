import type { PhSensorUserConfig, PhSensorAppConstants, PhSensorConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for storage,
//   readings, and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<PhSensorUserConfig> = {
  // CALIBRATION_FILE_PATH
  //   Role: JSON file holding the active neutral/acid calibration voltages.
  //   Critical: Non-empty path; relative paths resolve against the working directory.
  //   Recommended: A path on persistent storage next to the application data.
  CALIBRATION_FILE_PATH: 'ph_calibration_data.json',

  // CALIBRATION_MAKEDIRS
  //   Role: Create missing parent directories when saving calibration data.
  //   Critical: Boolean only.
  //   Recommended: true; false only when the directory is managed elsewhere.
  CALIBRATION_MAKEDIRS: true,

  // READING_DECIMALS
  //   Role: Decimal places of reported pH values.
  //   Critical: Integer in [0, 6].
  //   Recommended: 1–3; probe accuracy rarely justifies more than 2.
  READING_DECIMALS: 2,

  // TEMP_COMPENSATION_COEFFICIENT
  //   Role: Fractional probe voltage drift per °C away from the reference temperature.
  //   Critical: 0–0.1 (error outside).
  //   Recommended: 0.005–0.03; 0.01 matches the DFRobot analog board.
  TEMP_COMPENSATION_COEFFICIENT: 0.01,

  // REFERENCE_TEMPERATURE_C
  //   Role: Temperature (°C) at which the calibration is assumed valid.
  //   Critical: 0–50 °C.
  //   Recommended: 25 °C, the temperature buffer solutions are specified at.
  REFERENCE_TEMPERATURE_C: 25,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO).
  CONSOLE_LOG_LEVEL: 1,

  // GLOBAL_LOG_LEVEL
  //   Role: Current master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation, 0 (DEBUG) only while troubleshooting.
  GLOBAL_LOG_LEVEL: 1,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Probe and buffer characteristics that should rarely change,
//   unless porting to a different signal board.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<PhSensorAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; *_LOG_LEVEL settings must use these.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // NEUTRAL_PH / ACID_PH
  //   Role: pH of the two calibration buffer solutions.
  //   Critical: Must differ; the calibration line is undefined otherwise.
  NEUTRAL_PH: 7.0,
  ACID_PH: 4.0,

  // DEFAULT_NEUTRAL_VOLTAGE_MV / DEFAULT_ACID_VOLTAGE_MV
  //   Role: Factory output of an uncalibrated probe in pH 7 and pH 4 buffer.
  //   Critical: Must lie inside NEUTRAL_WINDOW_MV / ACID_WINDOW_MV.
  DEFAULT_NEUTRAL_VOLTAGE_MV: 1500.0,
  DEFAULT_ACID_VOLTAGE_MV: 2032.44,

  // NEUTRAL_WINDOW_MV / ACID_WINDOW_MV
  //   Role: Exclusive voltage ranges accepted as pH 7 / pH 4 buffer readings.
  //     Also used by auto calibration to tell the two buffers apart.
  //   Critical: Windows must not overlap.
  NEUTRAL_WINDOW_MV: { min: 1322, max: 1678 },
  ACID_WINDOW_MV: { min: 1854, max: 2210 },
};

/**
 * Merge user configuration and application constants
 * @param userConfig - User configuration to merge
 * @returns Complete configuration object
 */
export function buildConfig(userConfig: Readonly<PhSensorUserConfig>): PhSensorConfig {
  return { ...userConfig, ...APP_CONSTANTS };
}

const CONFIG: PhSensorConfig = buildConfig(USER_CONFIG);

export default CONFIG;
