import type { ConsoleAPI, ConsoleSink, Logger } from '@logging';
import type { CompostConfig, TimerAPI } from '$types';

/**
 * Console used during boot, before the logger exists
 */
export interface BootConsole extends ConsoleAPI {
  error(message: string): void;
}

/**
 * Host services the runtime is built on
 */
export interface RuntimeDependencies {
  timer: TimerAPI;
  console: BootConsole;
  /** Wall-clock seconds, used for logger uptime */
  timeSource: () => number;
}

/**
 * Validated configuration plus its wired logger
 */
export interface Runtime {
  config: CompostConfig;
  logger: Logger;
  consoleSink: ConsoleSink;
  isDebug: boolean;
}
