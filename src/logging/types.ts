/**
 * Logging type definitions
 */

/** 0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL */
export type LogLevel = 0 | 1 | 2 | 3;

/**
 * Log level constants, passed in so modules never import CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Change the global level at runtime */
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerConfig {
  level: LogLevel;
}

/**
 * Output target, receiving lines that already passed the global level
 */
export interface LogSink {
  /** The level is passed so sinks can route output (log vs warn) */
  write(formattedMessage: string, level: LogLevel): void;
}

export interface SinkWithLevel {
  sink: LogSink;
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  sinks: SinkWithLevel[];
  /** Receives sink failures; global console when omitted */
  fallback?: Pick<ConsoleAPI, 'warn'>;
}

/**
 * The part of the console the sinks use
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

export interface ConsoleSinkConfig {
  /** Lines at or above this level go to warn instead of log */
  warnFrom: LogLevel;
}

/**
 * Sink that keeps every line for later inspection
 */
export interface MemorySink extends LogSink {
  getLines(): string[];
  clear(): void;
}
