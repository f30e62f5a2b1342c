/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, toLogLevel, fmtPercent, fmtCelsius } from './helpers';
export { createConsoleSink } from './console';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleSinkDependencies,
  ConsoleAPI,
  FilterContext,
  InitMessage
} from './types';
