/**
 * Runtime initialization
 */

import { createConsoleSink, createLogger, toLogLevel } from '@logging';
import { validateConfig } from '@validation';

import type { InitMessage, SinkWithLevel } from '@logging';
import type { CompostConfig } from '$types';
import type { Runtime, RuntimeDependencies } from './types';

/**
 * Validate configuration and wire the logger
 *
 * Validation failures are printed straight to the console, since no logger
 * exists yet.
 *
 * @param config - Merged configuration
 * @param deps - Timer, console and wall clock
 * @param onReady - Called once every sink has initialized
 * @returns Runtime, or null if the configuration is invalid
 */
export function initialize(
  config: CompostConfig,
  deps: RuntimeDependencies,
  onReady?: (runtime: Runtime) => void
): Runtime | null {
  const validation = validateConfig(config);

  if (!validation.valid) {
    deps.console.error("INIT FAIL: Invalid configuration");
    validation.errors.forEach(function(err) {
      deps.console.error("  [" + err.field + "]: " + err.message);
    });
    return null;
  }

  if (validation.warnings.length > 0) {
    validation.warnings.forEach(function(warn) {
      deps.console.warn("  [" + warn.field + "]: " + warn.message);
    });
  }

  // Setup logging
  const consoleSink = createConsoleSink({ timer: deps.timer, console: deps.console }, {
    bufferSize: config.CONSOLE_BUFFER_SIZE,
    drainInterval: config.CONSOLE_INTERVAL_MS
  });

  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({ sink: consoleSink, minLevel: toLogLevel(config.CONSOLE_LOG_LEVEL, config.LOG_LEVELS) });
  }

  const level = toLogLevel(config.GLOBAL_LOG_LEVEL, config.LOG_LEVELS);
  const logger = createLogger({
    level: level,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.timeSource,
    sinks: sinks
  }, config.LOG_LEVELS);

  const runtime: Runtime = {
    config: config,
    logger: logger,
    consoleSink: consoleSink,
    isDebug: level <= config.LOG_LEVELS.DEBUG
  };

  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    logger.info("🌱 Compost pile simulation");
    logger.info("⏳ " + config.HOURS_TO_COMPLETE + "h to finish | 🔄 turn +" + config.TURN_SPEEDUP_HOURS +
      "h every " + config.TURN_COOLDOWN_HOURS + "h | 📦 " + config.MAX_CAPACITY + " items");
    logger.info("🧪 C:N green " + config.GREEN_CN_RATIO + " / brown " + config.BROWN_CN_RATIO +
      " / optimal " + config.OPTIMAL_CN_RATIO);

    // Sink failures go straight to the console; the logger may be the thing that failed
    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        deps.console.log('⚠️ [WARNING]  ' + messages[i].message);
      }
    }

    if (onReady) {
      onReady(runtime);
    }
  });

  return runtime;
}
