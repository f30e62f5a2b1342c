/**
 * Console output sink with rate-limited buffering
 *
 * Keeps a burst of simulation logs (a fast-forwarded week can emit hundreds of
 * lines in one tick) from interleaving with CLI output by:
 * - Buffering messages up to a configurable limit
 * - Draining one message at a time at fixed intervals
 * - Dropping messages with warning when buffer overflows
 */

import type { TimerHandle } from '$types';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleSinkDependencies } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param dependencies - Timer and console APIs
 * @param config - Sink configuration (bufferSize, drainInterval)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(
 *   { timer: nodeTimer, console: console },
 *   { bufferSize: 150, drainInterval: 10 }
 * );
 * consoleSink.initialize(function() {});
 * consoleSink.write("Hello world");
 * consoleSink.dispose();
 * ```
 */
export function createConsoleSink(
  dependencies: ConsoleSinkDependencies,
  config: ConsoleSinkConfig
): ConsoleSink {
  const timerApi = dependencies.timer;
  const consoleApi = dependencies.console;
  const buffer: string[] = [];
  let drainHandle: TimerHandle | null = null;

  /**
   * Drain one message from buffer
   * Called by timer at fixed interval
   */
  function drain(): void {
    const next = buffer.shift();
    if (next !== undefined) {
      consoleApi.log(next);
    }
  }

  /**
   * Start the drain timer (idempotent)
   */
  function startDrain(): void {
    if (drainHandle === null) {
      drainHandle = timerApi.set(config.drainInterval, true, drain);
    }
  }

  /**
   * Write formatted message to buffer
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string): void {
    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function flush(): void {
    while (buffer.length > 0) {
      drain();
    }
  }

  /**
   * Flush remaining messages and stop the drain timer
   */
  function dispose(): void {
    flush();
    if (drainHandle !== null) {
      timerApi.clear(drainHandle);
      drainHandle = null;
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Initialize the sink by starting the drain timer
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    startDrain();
    callback(true, 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    flush: flush,
    dispose: dispose,
    getBufferSize: getBufferSize
  };
}
