/**
 * Unit tests for logger coordinator
 */

import type { Mock } from 'vitest';

import { createLogger } from './logger';
import type { LogLevels, LogSink, SinkWithLevel, InitMessage } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('createLogger', () => {
  let mockTimeSource: Mock<() => number>;
  let write: Mock<(msg: string) => void>;
  let mockSink: SinkWithLevel;

  beforeEach(() => {
    mockTimeSource = vi.fn(() => 100);
    write = vi.fn();
    mockSink = {
      sink: { write: write },
      minLevel: LOG_LEVELS.DEBUG
    };
  });

  describe('log level methods', () => {
    test('should log debug messages when level is DEBUG', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('test debug');

      expect(write).toHaveBeenCalledWith('[DEBUG]    test debug');
    });

    test('should log info messages when level is INFO', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.info('pile started');

      expect(write).toHaveBeenCalledWith('ℹ️ [INFO]     pile started');
    });

    test('should log warning messages', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.warning('legacy save reset');

      expect(write).toHaveBeenCalledWith('⚠️ [WARNING]  legacy save reset');
    });

    test('should log critical messages', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.CRITICAL, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.critical('test critical');

      expect(write).toHaveBeenCalledWith('🚨 [CRITICAL] test critical');
    });

    test('should log via generic log method', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.log(LOG_LEVELS.WARNING, 'generic log');

      expect(write).toHaveBeenCalledWith('⚠️ [WARNING]  generic log');
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('should not appear');

      expect(write).not.toHaveBeenCalled();
    });

    test('should not log info when level is WARNING', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.info('should not appear');

      expect(write).not.toHaveBeenCalled();
    });

    test('should always log critical regardless of level', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.CRITICAL, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.critical('always visible');

      expect(write).toHaveBeenCalledTimes(1);
    });
  });

  describe('auto-demotion', () => {
    test('should demote INFO after demoteHours of uptime', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      mockTimeSource.mockReturnValue(100 + 25 * 3600);
      logger.info('suppressed');

      expect(write).not.toHaveBeenCalled();
    });

    test('should not demote WARNING after demoteHours', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      mockTimeSource.mockReturnValue(100 + 25 * 3600);
      logger.warning('still visible');

      expect(write).toHaveBeenCalledWith('⚠️ [WARNING]  still visible');
    });

    test('should not demote INFO in DEBUG mode', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      mockTimeSource.mockReturnValue(100 + 25 * 3600);
      logger.info('visible');

      expect(write).toHaveBeenCalledTimes(1);
    });
  });

  describe('setLevel and getLevel', () => {
    test('should return initial level', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [] },
        LOG_LEVELS
      );

      expect(logger.getLevel()).toBe(LOG_LEVELS.WARNING);
    });

    test('should filter based on new level after setLevel', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('hidden');
      logger.setLevel(LOG_LEVELS.DEBUG);
      logger.debug('shown');

      expect(logger.getLevel()).toBe(LOG_LEVELS.DEBUG);
      expect(write).toHaveBeenCalledTimes(1);
      expect(write).toHaveBeenCalledWith('[DEBUG]    shown');
    });
  });

  describe('multiple sinks', () => {
    test('should filter by per-sink minLevel', () => {
      const warnWrite = vi.fn<(msg: string) => void>();
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        {
          timeSource: mockTimeSource,
          sinks: [mockSink, { sink: { write: warnWrite }, minLevel: LOG_LEVELS.WARNING }]
        },
        LOG_LEVELS
      );

      logger.info('info only');
      logger.warning('both');

      expect(write).toHaveBeenCalledTimes(2);
      expect(warnWrite).toHaveBeenCalledTimes(1);
      expect(warnWrite).toHaveBeenCalledWith('⚠️ [WARNING]  both');
    });

    test('should continue to other sinks if one throws', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const broken: LogSink = {
        write: () => {
          throw new Error('disk full');
        }
      };
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [{ sink: broken, minLevel: LOG_LEVELS.DEBUG }, mockSink] },
        LOG_LEVELS
      );

      logger.info('survives');

      expect(write).toHaveBeenCalledWith('ℹ️ [INFO]     survives');
      expect(warnSpy).toHaveBeenCalledWith('Logger sink error: Error: disk full');
    });
  });

  describe('initialize', () => {
    test('should call callback immediately if no sinks need initialization', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );
      const callback = vi.fn<(success: boolean, messages: InitMessage[]) => void>();

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, []);
    });

    test('should collect messages from every sink and report failures', () => {
      const okSink: LogSink = {
        write: vi.fn(),
        initialize: (cb) => cb(true, 'ok sink ready')
      };
      const failingSink: LogSink = {
        write: vi.fn(),
        initialize: (cb) => cb(false, 'failing sink unavailable')
      };
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        {
          timeSource: mockTimeSource,
          sinks: [
            { sink: okSink, minLevel: LOG_LEVELS.INFO },
            { sink: failingSink, minLevel: LOG_LEVELS.INFO }
          ]
        },
        LOG_LEVELS
      );
      const callback = vi.fn<(success: boolean, messages: InitMessage[]) => void>();

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(false, [
        { success: true, message: 'ok sink ready' },
        { success: false, message: 'failing sink unavailable' }
      ]);
    });
  });
});
