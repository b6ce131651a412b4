/**
 * pH sensor toolkit entry point
 *
 * Typical use goes through initialize(), which validates the configuration
 * and wires the calibration store, logger and sensor together. The building
 * blocks are exported for hosts that want to wire them differently.
 */

export { initialize, APP_CONSTANTS, USER_CONFIG, buildConfig } from '@boot/index';
export type { BootConsole, InitDependencies, PhSensorRuntime } from '@boot/index';

export * from '@core/index';
export * from '@hardware/index';
export * from '@storage/index';
export * from '$types';

export { createLogger, createConsoleSink, createMemorySink, fmtMv, fmtPh } from '@logging';
export type { Logger, LogLevel, LogLevels, LogSink, MemorySink } from '@logging';

export { validateConfig } from '@validation';
export type { ValidationResult } from '@validation';

export { roundTo } from '@utils/number';
