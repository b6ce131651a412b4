/**
 * Leveled logger
 *
 * A message passes the global level first, then each sink's own minimum.
 * The line is formatted once and shared by every sink that accepts it.
 */

import { formatLogMessage, shouldLog } from './helpers';

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies } from './types';

/**
 * Create a logger instance
 *
 * @param config - Initial global level
 * @param dependencies - Output sinks and optional fallback console
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   { sinks: [{ sink: createConsoleSink(console, { warnFrom: LOG_LEVELS.WARNING }), minLevel: LOG_LEVELS.INFO }] },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Loading calibration data");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const sinks = dependencies.sinks;
  const fallback = dependencies.fallback || console;

  function log(level: LogLevel, msg: string): void {
    if (!shouldLog(level, currentLevel)) return;

    const line = formatLogMessage(level, msg, logLevels);

    sinks.forEach(function(entry) {
      if (level < entry.minLevel) return;

      try {
        entry.sink.write(line, level);
      } catch (err) {
        // Sink failures are reported, never thrown
        fallback.warn('Logger sink error: ' + err);
      }
    });
  }

  /**
   * Bind log() to a fixed level
   */
  function at(level: LogLevel): (msg: string) => void {
    return function(msg: string) {
      log(level, msg);
    };
  }

  return {
    log: log,
    debug: at(logLevels.DEBUG),
    info: at(logLevels.INFO),
    warning: at(logLevels.WARNING),
    critical: at(logLevels.CRITICAL),
    setLevel: function(newLevel: LogLevel) {
      currentLevel = newLevel;
    },
    getLevel: function() {
      return currentLevel;
    }
  };
}
