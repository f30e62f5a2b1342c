/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Per-sink minimum levels
 * - Runtime level adjustment
 * - Callback-based sink initialization
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minLevel it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: function() { return Date.now() / 1000; },
 *     sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.INFO }]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Pile started");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks || [];
  const startTime = timeSource();

  /**
   * Route one message to the sinks
   * @param level - Log level (0-3)
   * @param msg - Message to log
   */
  function log(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage);
      } catch (err) {
        // A failing sink must not take the simulation down with it
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  /**
   * Update log level at runtime
   * @param newLevel - New log level (0-3)
   */
  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   * @param callback - Called once with (success, messages[]) after every sink reported
   */
  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const messages: InitMessage[] = [];
    const pending: SinkWithLevel[] = [];

    for (let i = 0; i < sinks.length; i++) {
      if (sinks[i].sink.initialize) {
        pending.push(sinks[i]);
      }
    }

    if (pending.length === 0) {
      callback(true, messages);
      return;
    }

    let completed = 0;
    let allOk = true;
    for (let i = 0; i < pending.length; i++) {
      const init = pending[i].sink.initialize;
      if (!init) continue;

      init(function(success: boolean, message: string) {
        messages.push({ success: success, message: message });
        if (!success) allOk = false;
        completed++;
        if (completed === pending.length) {
          callback(allOk, messages);
        }
      });
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize
  };
}
