/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Format a millivolt value for log output
 * @param mv - Millivolt reading
 * @returns Formatted string such as "1500 mV"
 */
export function fmtMv(mv: number): string {
  return mv + " mV";
}

/**
 * Format a pH value for log output
 * @param ph - pH value (null when not available)
 * @param decimals - Decimal places to show
 * @returns Formatted string such as "pH 6.92"
 */
export function fmtPh(ph: number | null, decimals: number): string {
  if (ph === null) return "pH n/a";
  return "pH " + ph.toFixed(decimals);
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + msg;
}

/**
 * Check if message should be logged at the current level
 * @param level - Log level to check
 * @param currentLevel - Current minimum log level
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Narrow a number to a log level
 * @param value - Candidate level
 * @returns The level, or null if the value is not 0-3
 */
export function toLogLevel(value: number): LogLevel | null {
  if (value === 0 || value === 1 || value === 2 || value === 3) {
    return value;
  }
  return null;
}
