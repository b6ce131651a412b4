export { createCalibrationStore } from './calibration-store';
export { parseCalibrationFile, serializeCalibration } from './helpers';
export { nodeFileSystem } from './node-fs';
export * from './types';
