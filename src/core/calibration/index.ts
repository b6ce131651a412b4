export {
  fitLine,
  createCalibrationRecord,
  createDefaultCalibration,
  verifyCalibrationRecord,
  withBufferVoltage,
  getActiveVoltages,
  applyCalibration,
  compensateTemperature
} from './calibration';
export {
  validateMillivolts,
  validateTemperature,
  validateDecimals,
  MAX_READING_DECIMALS,
  isWithinWindow,
  isValidNeutralVoltage,
  isValidAcidVoltage,
  detectBuffer,
  bufferLabel
} from './helpers';
export * from './types';
