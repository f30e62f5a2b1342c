/**
 * Tests for time helper functions
 */

import { calculateHoursDelta, isGateDue } from './helpers';

describe('calculateHoursDelta', () => {
  describe('normal operation', () => {
    it('should calculate elapsed hours between two timestamps', () => {
      expect(calculateHoursDelta(105, 100)).toBe(5);
    });

    it('should keep fractional hours', () => {
      expect(calculateHoursDelta(100.25, 100)).toBe(0.25);
    });
  });

  describe('clock issues', () => {
    it('should return 0 when time has not advanced', () => {
      expect(calculateHoursDelta(100, 100)).toBe(0);
    });

    it('should return 0 when time went backwards', () => {
      expect(calculateHoursDelta(90, 100)).toBe(0);
    });

    it('should return 0 for non-finite timestamps', () => {
      expect(calculateHoursDelta(NaN, 100)).toBe(0);
      expect(calculateHoursDelta(100, Infinity)).toBe(0);
    });
  });
});

describe('isGateDue', () => {
  it('should fire at exactly the gate interval', () => {
    expect(isGateDue(101, 100, 1)).toBe(true);
  });

  it('should not fire before the gate interval', () => {
    expect(isGateDue(100.99, 100, 1)).toBe(false);
  });

  it('should fire after long gaps', () => {
    expect(isGateDue(172, 100, 1)).toBe(true);
  });

  it('should not fire when the clock went backwards', () => {
    expect(isGateDue(50, 100, 1)).toBe(false);
  });

  it('should not fire on a zero delta even with a zero gate', () => {
    expect(isGateDue(100, 100, 0)).toBe(false);
  });
});
