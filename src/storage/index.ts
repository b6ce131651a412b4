export * from './calibration-store';
