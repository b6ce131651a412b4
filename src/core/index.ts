/**
 * Core calibration logic barrel export
 */

export * from './calibration';
