/**
 * Logging helper functions
 */

import { TIME_CONSTANTS } from '@utils/constants';

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a 0..1 fraction as a whole percentage
 * @param value - Fraction to format
 * @returns Percentage string, e.g. "46%"
 */
export function fmtPercent(value: number): string {
  if (!isFinite(value)) return "n/a";
  return Math.round(value * 100) + "%";
}

/**
 * Format a temperature with one decimal
 * @param value - Temperature in °C
 * @returns Formatted temperature string, e.g. "20.8C"
 */
export function fmtCelsius(value: number): string {
  if (!isFinite(value)) return "n/a";
  return value.toFixed(1) + "C";
}

/**
 * Convert a configured numeric level to a LogLevel
 *
 * Values are rounded and clamped into 0..3 so a hand-edited config cannot
 * produce an out-of-range level.
 *
 * @param value - Numeric level from configuration
 * @param logLevels - Log level constants object
 * @returns Matching log level
 */
export function toLogLevel(value: number, logLevels: LogLevels): LogLevel {
  if (!isFinite(value)) return logLevels.DEBUG;

  const rounded = Math.round(value);
  if (rounded <= logLevels.DEBUG) return logLevels.DEBUG;
  if (rounded === logLevels.INFO) return logLevels.INFO;
  if (rounded === logLevels.WARNING) return logLevels.WARNING;
  return logLevels.CRITICAL;
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
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * TIME_CONSTANTS.SECONDS_PER_HOUR) {
      return false;
    }
  }

  return true;
}
