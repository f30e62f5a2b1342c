/**
 * Node timer adapter
 */

import type { TimerAPI, TimerHandle } from '$types';

/**
 * TimerAPI over setInterval/setTimeout
 *
 * Handles are unref'd so a pending drain never keeps the process alive.
 */
export function createNodeTimer(): TimerAPI {
  return {
    set: function(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle {
      const handle = repeat ? setInterval(callback, intervalMs) : setTimeout(callback, intervalMs);
      handle.unref();
      return handle;
    },
    clear: function(handle: TimerHandle): void {
      clearInterval(handle);
    }
  };
}
