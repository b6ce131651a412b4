/**
 * Console output sink
 *
 * Routes DEBUG/INFO lines to console.log and WARNING/CRITICAL lines to
 * console.warn so warnings land on stderr when run from the CLI.
 */

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Level from which messages are written with warn()
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { warnFrom: 2 });
 * consoleSink.write("Hello world", 1);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): LogSink {
  function write(formattedMessage: string, level: LogLevel) {
    if (level >= config.warnFrom) {
      consoleApi.warn(formattedMessage);
    } else {
      consoleApi.log(formattedMessage);
    }
  }

  return {
    write: write
  };
}
