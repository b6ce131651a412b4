import type { PhSensor } from '@hardware/ph-sensor';
import type { ConsoleAPI, Logger } from '@logging';
import type { CalibrationStore, FileSystemAPI } from '@storage/calibration-store';
import type { PhSensorConfig } from '$types';

/**
 * Console used during startup; error reports invalid configuration
 */
export interface BootConsole extends ConsoleAPI {
  error(message: string): void;
}

/**
 * Platform APIs initialize() wires into the runtime
 */
export interface InitDependencies {
  fs?: FileSystemAPI;
  console?: BootConsole;
}

/**
 * Fully wired sensor runtime
 */
export interface PhSensorRuntime {
  sensor: PhSensor;
  store: CalibrationStore;
  logger: Logger;
  config: PhSensorConfig;
}
