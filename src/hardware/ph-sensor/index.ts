export { createPhSensor } from './ph-sensor';
export * from './types';
