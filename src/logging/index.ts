/**
 * Leveled logging with console and in-memory sinks
 */

export { formatLogMessage, shouldLog, toLogLevel, fmtMv, fmtPh } from './helpers';
export { createConsoleSink } from './console';
export { createMemorySink } from './memory';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleAPI,
  ConsoleSinkConfig,
  MemorySink
} from './types';
