/**
 * Tests for configuration validator
 */

import CONFIG, { resolveConfig } from '@boot/config';

import { validateConfig } from './validator';

describe('validateConfig', () => {
  it('should accept the default configuration without warnings', () => {
    const result = validateConfig(CONFIG);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('should reject a completion time outside 1-10000 hours', () => {
    const result = validateConfig(resolveConfig({ HOURS_TO_COMPLETE: 20000 }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{
      level: 'CRITICAL',
      field: 'HOURS_TO_COMPLETE',
      message: 'HOURS_TO_COMPLETE must be between 1 and 10000 (got 20000)'
    }]);
  });

  it('should accept a fast completion time with a warning', () => {
    const result = validateConfig(resolveConfig({ HOURS_TO_COMPLETE: 48 }));

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.field)).toEqual(['HOURS_TO_COMPLETE']);
  });

  it('should cap the bulk amount at the pile capacity', () => {
    const result = validateConfig(resolveConfig({ MAX_CAPACITY: 8, BULK_ADD_AMOUNT: 10 }));

    expect(result.errors).toEqual([{
      level: 'CRITICAL',
      field: 'BULK_ADD_AMOUNT',
      message: 'BULK_ADD_AMOUNT must be between 1 and 8 (got 10)'
    }]);
    expect(result.warnings.map((w) => w.field)).toEqual(['MAX_CAPACITY']);
  });

  it('should reject a non-integer capacity', () => {
    const result = validateConfig(resolveConfig({ MAX_CAPACITY: 63.5 }));

    expect(result.errors.map((e) => e.field)).toContain('MAX_CAPACITY');
  });

  it('should require brown material to carry more carbon than green', () => {
    const result = validateConfig(resolveConfig({ GREEN_CN_RATIO: 50, BROWN_CN_RATIO: 40 }));

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual(['BROWN_CN_RATIO', 'OPTIMAL_CN_RATIO']);
  });

  it('should require the optimal ratio to be reachable', () => {
    const result = validateConfig(resolveConfig({ OPTIMAL_CN_RATIO: 80 }));

    expect(result.errors.map((e) => e.field)).toEqual(['OPTIMAL_CN_RATIO']);
  });

  it('should reject a bonus below 1', () => {
    const result = validateConfig(resolveConfig({ OPTIMAL_RATIO_BONUS: 0.9 }));

    expect(result.errors[0].message).toBe('OPTIMAL_RATIO_BONUS must be between 1 and 5 (got 0.9)');
  });

  it('should reject log levels outside 0-3', () => {
    const result = validateConfig(resolveConfig({ GLOBAL_LOG_LEVEL: 4, CONSOLE_LOG_LEVEL: 1.5 }));

    expect(result.errors.map((e) => e.message)).toEqual([
      'CONSOLE_LOG_LEVEL must be an integer (got 1.5)',
      'GLOBAL_LOG_LEVEL must be between 0 and 3 (got 4)'
    ]);
  });

  it('should report overlapping material lists', () => {
    const result = validateConfig(resolveConfig({ BROWN_ITEM_CODES: ['stick', 'rot'] }));

    expect(result.errors).toEqual([{
      level: 'CRITICAL',
      field: 'MATERIAL_LISTS',
      message: 'Item code "rot" is listed as both green and brown'
    }]);
  });

  it('should not run list checks when numeric errors exist', () => {
    const result = validateConfig(resolveConfig({ BROWN_ITEM_CODES: ['rot'], WATER_AMOUNT: 2 }));

    expect(result.errors.map((e) => e.field)).toEqual(['WATER_AMOUNT']);
  });
});
