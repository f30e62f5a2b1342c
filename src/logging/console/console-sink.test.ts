/**
 * Unit tests for console sink
 */

import type { Mock } from 'vitest';

import type { TimerAPI, TimerHandle } from '$types';
import { createConsoleSink } from './console-sink';
import type { ConsoleAPI } from '../types';

describe('createConsoleSink', () => {
  let timerCallback: (() => void) | null;
  let setTimer: Mock<TimerAPI['set']>;
  let clearTimer: Mock<TimerAPI['clear']>;
  let mockTimer: TimerAPI;
  let log: Mock<ConsoleAPI['log']>;
  let warn: Mock<ConsoleAPI['warn']>;
  let mockConsole: ConsoleAPI;
  const fakeHandle: TimerHandle = setInterval(() => undefined, 60000);
  clearInterval(fakeHandle);

  beforeEach(() => {
    timerCallback = null;
    setTimer = vi.fn((_interval: number, _repeat: boolean, callback: () => void) => {
      timerCallback = callback;
      return fakeHandle;
    });
    clearTimer = vi.fn();
    mockTimer = { set: setTimer, clear: clearTimer };
    log = vi.fn();
    warn = vi.fn();
    mockConsole = { log: log, warn: warn };
  });

  function tick(): void {
    if (timerCallback) timerCallback();
  }

  describe('write', () => {
    test('should buffer messages', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });

      sink.write('message 1');
      sink.write('message 2');

      expect(sink.getBufferSize()).toBe(2);
    });

    test('should not write to console immediately', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });

      sink.write('message');

      expect(log).not.toHaveBeenCalled();
    });

    test('should drop messages when buffer is full', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 2,
        drainInterval: 100
      });

      sink.write('message 1');
      sink.write('message 2');
      sink.write('message 3');

      expect(sink.getBufferSize()).toBe(2);
      expect(warn).toHaveBeenCalledWith('Console log buffer overflow, dropping message: message 3');
    });
  });

  describe('initialize', () => {
    test('should set up a repeating timer with the configured interval', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 25
      });

      sink.initialize(() => undefined);

      expect(setTimer).toHaveBeenCalledWith(25, true, expect.any(Function));
    });

    test('should be idempotent - only start once', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });

      sink.initialize(() => undefined);
      sink.initialize(() => undefined);

      expect(setTimer).toHaveBeenCalledTimes(1);
    });

    test('should drain one message per tick in FIFO order', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });
      sink.initialize(() => undefined);

      sink.write('first');
      sink.write('second');
      tick();

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith('first');
      expect(sink.getBufferSize()).toBe(1);

      tick();
      expect(log).toHaveBeenLastCalledWith('second');
    });

    test('should handle empty buffer gracefully', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });
      sink.initialize(() => undefined);

      tick();

      expect(log).not.toHaveBeenCalled();
    });

    test('should call callback with success', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });
      const callback = vi.fn<(success: boolean, message: string) => void>();

      sink.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, 'Console sink initialized');
    });
  });

  describe('flush and dispose', () => {
    test('should write every buffered message on flush', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });

      sink.write('a');
      sink.write('b');
      sink.write('c');
      sink.flush();

      expect(log.mock.calls).toEqual([['a'], ['b'], ['c']]);
      expect(sink.getBufferSize()).toBe(0);
    });

    test('should flush and clear the timer on dispose', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });
      sink.initialize(() => undefined);
      sink.write('last words');

      sink.dispose();

      expect(log).toHaveBeenCalledWith('last words');
      expect(clearTimer).toHaveBeenCalledWith(fakeHandle);
    });

    test('should not clear a timer that was never started', () => {
      const sink = createConsoleSink({ timer: mockTimer, console: mockConsole }, {
        bufferSize: 10,
        drainInterval: 100
      });

      sink.dispose();

      expect(clearTimer).not.toHaveBeenCalled();
    });
  });
});
