/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces
 * - Filter context
 * - Initialization messages
 */

import type { TimerAPI } from '$types';

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  /** The output sink */
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current wall-clock time in seconds */
  timeSource: () => number;
  /** Sinks with their minimum levels */
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called
 */
export interface LogSink {
  /** Write formatted message to sink */
  write(formattedMessage: string): void;
  /** Optional initialization (e.g. start timers) */
  initialize?(callback: (success: boolean, message: string) => void): void;
}

/**
 * Console sink interface
 * Buffers messages and drains at fixed interval
 */
export interface ConsoleSink extends LogSink {
  /** Initialize by starting drain timer */
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Write every buffered message immediately */
  flush(): void;
  /** Flush and stop the drain timer */
  dispose(): void;
  /** Get current buffer size */
  getBufferSize(): number;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Maximum messages in buffer before dropping */
  bufferSize: number;
  /** Interval between draining messages (ms) */
  drainInterval: number;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  /** Log message to console */
  log(message: string): void;
  /** Log warning to console */
  warn(message: string): void;
}

/**
 * Console sink dependencies
 */
export interface ConsoleSinkDependencies {
  timer: TimerAPI;
  console: ConsoleAPI;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  /** Current minimum log level */
  currentLevel: LogLevel;
  /** Logger uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 */
export interface InitMessage {
  /** Whether initialization succeeded */
  success: boolean;
  /** Human-readable status message */
  message: string;
}
