/**
 * Tests for the temperature model
 */

import {
  applyTurningCooling,
  beginTemperature,
  createTemperatureState,
  resetTemperature,
  setInternalTemperature,
  updateTemperature
} from './temperature';
import {
  calculateHeatGeneration,
  calculateHeatLoss,
  getEvaporationMultiplier,
  getTemperatureAboveAmbient,
  getTemperatureModifier,
  getTemperatureState,
  isThermophilic,
  isTooCold,
  isTooHot
} from './helpers';
import type { TemperatureInputs } from './types';

describe('temperature', () => {
  const fullActivity: TemperatureInputs = {
    activity: 1,
    moistureLevel: 0.5,
    aerationLevel: 1,
    cnModifier: 1,
    pileSize: 1
  };

  const idle: TemperatureInputs = {
    activity: 0,
    moistureLevel: 0.5,
    aerationLevel: 0.7,
    cnModifier: 1,
    pileSize: 0
  };

  describe('state lifecycle', () => {
    it('should default to 20 °C inside and out', () => {
      expect(createTemperatureState()).toEqual({ internal: 20, ambient: 20, lastUpdateTime: 0 });
    });

    it('should reset internal to the last ambient', () => {
      const state = { internal: 55, ambient: 12, lastUpdateTime: 40 };
      resetTemperature(state);
      expect(state).toEqual({ internal: 12, ambient: 12, lastUpdateTime: 0 });
    });

    it('should begin at the sampled ambient', () => {
      const state = createTemperatureState();
      beginTemperature(state, 7, { temperature: 8, rainfall: 0 });
      expect(state).toEqual({ internal: 8, ambient: 8, lastUpdateTime: 7 });
    });
  });

  describe('updateTemperature', () => {
    it('should initialise an unstamped state at ambient', () => {
      const state = createTemperatureState();

      expect(updateTemperature(state, 30, fullActivity, { temperature: 14, rainfall: 0 })).toBe(false);
      expect(state).toEqual({ internal: 14, ambient: 14, lastUpdateTime: 30 });
    });

    it('should not fire within the hourly gate', () => {
      const state = { internal: 20, ambient: 20, lastUpdateTime: 10 };

      expect(updateTemperature(state, 10.5, fullActivity, { temperature: 25, rainfall: 0 })).toBe(false);
      expect(state.ambient).toBe(20);
    });

    it('should heat by generation times elapsed hours', () => {
      const state = { internal: 20, ambient: 20, lastUpdateTime: 10 };

      expect(updateTemperature(state, 12, fullActivity, { temperature: 20, rainfall: 0 })).toBe(true);
      // generation 2 * 1 * 1.5 * 1 * 1 = 3 °C/h for 2 h
      expect(state.internal).toBeCloseTo(26, 10);
      expect(state.lastUpdateTime).toBe(12);
    });

    it('should refresh ambient and never fall more than 5 °C below it', () => {
      const state = { internal: 20, ambient: 20, lastUpdateTime: 10 };

      updateTemperature(state, 13, idle, { temperature: -30, rainfall: 0 });
      expect(state.ambient).toBe(-30);
      expect(state.internal).toBe(-35);
    });

    it('should cap the pile at 80 °C', () => {
      const state = { internal: 78, ambient: 78, lastUpdateTime: 10 };

      updateTemperature(state, 11, { ...fullActivity, activity: 5 }, { temperature: 78, rainfall: 0 });
      expect(state.internal).toBe(80);
    });
  });

  describe('applyTurningCooling', () => {
    it('should release 40% of the heat above ambient', () => {
      const state = { internal: 60, ambient: 20, lastUpdateTime: 1 };
      applyTurningCooling(state);
      expect(state.internal).toBeCloseTo(44, 10);
    });

    it('should leave a pile at or below ambient unchanged', () => {
      const state = { internal: 10, ambient: 20, lastUpdateTime: 1 };
      applyTurningCooling(state);
      expect(state.internal).toBe(10);
    });
  });

  describe('setInternalTemperature', () => {
    it('should clamp to -10..80', () => {
      const state = createTemperatureState();
      setInternalTemperature(state, 95);
      expect(state.internal).toBe(80);
      setInternalTemperature(state, -40);
      expect(state.internal).toBe(-10);
    });

    it('should ignore non-finite values', () => {
      const state = createTemperatureState();
      setInternalTemperature(state, NaN);
      expect(state.internal).toBe(20);
    });
  });

  describe('helpers', () => {
    it('should compute heat generation', () => {
      expect(calculateHeatGeneration(fullActivity)).toBeCloseTo(3, 10);
      expect(calculateHeatGeneration(idle)).toBe(0);
      expect(calculateHeatGeneration({ ...fullActivity, activity: 5 })).toBe(10);
    });

    it('should compute conduction loss reduced by pile size', () => {
      expect(calculateHeatLoss(60, 20, 0.5, 0)).toBeCloseTo(20, 10);
      expect(calculateHeatLoss(10, 20, 0.5, 0)).toBeCloseTo(-5, 10);
    });

    it('should add evaporative loss for a wet, warm pile', () => {
      // 40 * 0.5 * 0.7 + 0.2 * (40 / 50) * 1.5
      expect(calculateHeatLoss(60, 20, 0.7, 1)).toBeCloseTo(14.24, 10);
    });

    it.each([
      [0, 0.1, 'Cold'],
      [7, 0.3, 'Cold'],
      [15, 0.6, 'Cool'],
      [25, 0.9, 'Warm'],
      [35, 1.1, 'Getting Hot'],
      [50, 1.5, 'Thermophilic'],
      [55, 1.5, 'Thermophilic'],
      [60, 1.3, 'Thermophilic'],
      [68, 0.7, 'Too Hot'],
      [75, 0.3, 'Critically Hot']
    ])('should map %s °C to modifier %s (%s)', (temperature, modifier, band) => {
      expect(getTemperatureModifier(temperature)).toBe(modifier);
      expect(getTemperatureState(temperature)).toBe(band);
    });

    it('should raise evaporation only above ambient', () => {
      expect(getEvaporationMultiplier(45, 20)).toBeCloseTo(1.5, 10);
      expect(getEvaporationMultiplier(10, 20)).toBe(1);
    });

    it('should report heat above ambient, never negative', () => {
      expect(getTemperatureAboveAmbient(45, 20)).toBe(25);
      expect(getTemperatureAboveAmbient(10, 20)).toBe(0);
    });

    it('should classify predicates', () => {
      expect(isThermophilic(40)).toBe(true);
      expect(isThermophilic(65)).toBe(true);
      expect(isThermophilic(66)).toBe(false);
      expect(isTooCold(19.9)).toBe(true);
      expect(isTooHot(65)).toBe(false);
      expect(isTooHot(65.1)).toBe(true);
    });
  });
});
