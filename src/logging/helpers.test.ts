/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, toLogLevel, fmtPercent, fmtCelsius } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should format DEBUG level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
  });

  test('should format INFO level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('ℹ️ [INFO]     test message');
  });

  test('should format WARNING level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('⚠️ [WARNING]  test message');
  });

  test('should format CRITICAL level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('🚨 [CRITICAL] test message');
  });

  test('should handle empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('ℹ️ [INFO]     ');
  });
});

describe('shouldLog', () => {
  test('should reject messages below the current level', () => {
    const context = { currentLevel: LOG_LEVELS.WARNING, uptime: 0, demoteHours: 0 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
  });

  test('should accept messages at the current level', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptime: 0, demoteHours: 0 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });

  test('should demote INFO once uptime exceeds demoteHours', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptime: 2 * 3600 + 1, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
  });

  test('should keep INFO at exactly demoteHours', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptime: 2 * 3600, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });

  test('should never demote when demoteHours is 0', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptime: 1e9, demoteHours: 0 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });

  test('should never demote in DEBUG mode', () => {
    const context = { currentLevel: LOG_LEVELS.DEBUG, uptime: 1e9, demoteHours: 1 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });
});

describe('toLogLevel', () => {
  test('should map each configured number to its level', () => {
    expect(toLogLevel(0, LOG_LEVELS)).toBe(0);
    expect(toLogLevel(1, LOG_LEVELS)).toBe(1);
    expect(toLogLevel(2, LOG_LEVELS)).toBe(2);
    expect(toLogLevel(3, LOG_LEVELS)).toBe(3);
  });

  test('should round fractional values', () => {
    expect(toLogLevel(0.4, LOG_LEVELS)).toBe(0);
    expect(toLogLevel(1.4, LOG_LEVELS)).toBe(1);
    expect(toLogLevel(1.6, LOG_LEVELS)).toBe(2);
  });

  test('should clamp out-of-range values', () => {
    expect(toLogLevel(-5, LOG_LEVELS)).toBe(0);
    expect(toLogLevel(9, LOG_LEVELS)).toBe(3);
    expect(toLogLevel(NaN, LOG_LEVELS)).toBe(0);
  });
});

describe('fmtPercent', () => {
  test('should format fractions as whole percentages', () => {
    expect(fmtPercent(0.46)).toBe('46%');
    expect(fmtPercent(1)).toBe('100%');
    expect(fmtPercent(0)).toBe('0%');
  });

  test('should return n/a for non-finite input', () => {
    expect(fmtPercent(NaN)).toBe('n/a');
  });
});

describe('fmtCelsius', () => {
  test('should format with one decimal', () => {
    expect(fmtCelsius(20.84)).toBe('20.8C');
    expect(fmtCelsius(-3)).toBe('-3.0C');
  });

  test('should return n/a for non-finite input', () => {
    expect(fmtCelsius(Infinity)).toBe('n/a');
  });
});
