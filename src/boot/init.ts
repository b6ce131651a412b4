/**
 * Sensor runtime initialization
 */

import { buildConfig, USER_CONFIG } from './config';
import { createPhSensor } from '@hardware/ph-sensor';
import { createConsoleSink, createLogger } from '@logging';
import { createCalibrationStore, nodeFileSystem } from '@storage/calibration-store';
import { validateConfig } from '@validation';

import type { SinkWithLevel } from '@logging';
import type { PhSensorUserConfig } from '$types';
import type { InitDependencies, PhSensorRuntime } from './types';

export function initialize(
  overrides?: Partial<PhSensorUserConfig>,
  dependencies?: InitDependencies
): PhSensorRuntime | null {
  const out = (dependencies && dependencies.console) || console;
  const fs = (dependencies && dependencies.fs) || nodeFileSystem;
  const userConfig: PhSensorUserConfig = { ...USER_CONFIG, ...overrides };
  const config = buildConfig(userConfig);

  // Validate configuration
  const validation = validateConfig(userConfig, config);

  if (!validation.valid) {
    out.error("INIT FAIL: Invalid configuration");
    validation.errors.forEach(function(err) {
      out.error("  [" + err.field + "]: " + err.message);
    });
    return null;
  }

  if (validation.warnings.length > 0) {
    validation.warnings.forEach(function(warn) {
      out.warn("  [" + warn.field + "]: " + warn.message);
    });
  }

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({
      sink: createConsoleSink(out, { warnFrom: config.LOG_LEVELS.WARNING }),
      minLevel: config.CONSOLE_LOG_LEVEL
    });
  }

  const logger = createLogger({ level: config.GLOBAL_LOG_LEVEL }, { sinks: sinks, fallback: out }, config.LOG_LEVELS);

  const store = createCalibrationStore({
    filePath: config.CALIBRATION_FILE_PATH,
    makedirs: config.CALIBRATION_MAKEDIRS
  }, {
    fs: fs,
    logger: logger
  }, config);

  const sensor = createPhSensor({
    decimals: config.READING_DECIMALS,
    tempCoefficient: config.TEMP_COMPENSATION_COEFFICIENT,
    referenceTemperatureC: config.REFERENCE_TEMPERATURE_C
  }, {
    store: store,
    logger: logger
  }, config);

  return { sensor: sensor, store: store, logger: logger, config: config };
}
