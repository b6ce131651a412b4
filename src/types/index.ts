export type { MillivoltReading, PhValue } from './common';
export type {
  VoltageWindow,
  PhSensorUserConfig,
  PhSensorAppConstants,
  PhSensorConfig
} from './config';
export {
  ValidationError,
  InvalidInputError,
  CalibrationValidationError,
  CalibrationFileError,
  CalibrationStorageError
} from './errors';
