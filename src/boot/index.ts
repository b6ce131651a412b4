export { initialize } from './init';
export { APP_CONSTANTS, USER_CONFIG, buildConfig } from './config';
export type { BootConsole, InitDependencies, PhSensorRuntime } from './types';
