/**
 * Temperature model
 *
 * Hourly heat balance between microbial heat and losses to the air.
 * Ambient is refreshed from the climate sample on every firing.
 */

import type { ClimateSample, Hours } from '$types';
import { clamp, isFiniteNumber } from '@utils/number';
import { calculateHoursDelta, isGateDue } from '@utils/time';

import { calculateHeatGeneration, calculateHeatLoss } from './helpers';
import { TEMPERATURE_CONSTANTS } from './types';
import type { TemperatureInputs, TemperatureState } from './types';

export function createTemperatureState(): TemperatureState {
  return {
    internal: TEMPERATURE_CONSTANTS.DEFAULT_TEMPERATURE_C,
    ambient: TEMPERATURE_CONSTANTS.DEFAULT_TEMPERATURE_C,
    lastUpdateTime: 0
  };
}

/**
 * Reset the pile to the last known ambient (MUTABLE)
 * @param state - State to reset (will be mutated)
 */
export function resetTemperature(state: TemperatureState): void {
  state.internal = state.ambient;
  state.lastUpdateTime = 0;
}

/**
 * Start the pile at ambient (MUTABLE)
 * @param state - State to start (will be mutated)
 * @param now - Current game-clock hours
 * @param climate - Climate at the pile
 */
export function beginTemperature(state: TemperatureState, now: Hours, climate: ClimateSample): void {
  state.ambient = climate.temperature;
  state.internal = climate.temperature;
  state.lastUpdateTime = now;
}

/**
 * Run the heat balance if an hour has passed (MUTABLE)
 *
 * An unstamped state starts at ambient on its first call instead.
 * The balance is multiplied by the elapsed hours and clamped between
 * 5 °C below ambient and 80 °C.
 *
 * @param state - Temperature state (will be mutated)
 * @param now - Current game-clock hours
 * @param inputs - Pile conditions for this update
 * @param climate - Climate at the pile
 * @returns True when the temperature was recalculated
 */
export function updateTemperature(
  state: TemperatureState,
  now: Hours,
  inputs: TemperatureInputs,
  climate: ClimateSample
): boolean {
  if (state.lastUpdateTime === 0) {
    beginTemperature(state, now, climate);
    return false;
  }

  if (!isGateDue(now, state.lastUpdateTime, TEMPERATURE_CONSTANTS.UPDATE_INTERVAL_HOURS)) {
    return false;
  }

  const hours = calculateHoursDelta(now, state.lastUpdateTime);
  state.lastUpdateTime = now;
  state.ambient = climate.temperature;

  const generation = calculateHeatGeneration(inputs);
  const loss = calculateHeatLoss(state.internal, state.ambient, inputs.moistureLevel, inputs.pileSize);

  state.internal = clamp(
    state.internal + (generation - loss) * hours,
    state.ambient - TEMPERATURE_CONSTANTS.BELOW_AMBIENT_FLOOR_C,
    TEMPERATURE_CONSTANTS.MAX_PILE_C
  );

  return true;
}

/**
 * Release 40% of the heat above ambient (MUTABLE)
 *
 * A pile at or below ambient is left unchanged.
 *
 * @param state - Temperature state (will be mutated)
 */
export function applyTurningCooling(state: TemperatureState): void {
  const above = state.internal - state.ambient;
  if (above <= 0) return;

  state.internal -= above * TEMPERATURE_CONSTANTS.TURNING_HEAT_LOSS_FRACTION;
}

export function setInternalTemperature(state: TemperatureState, temperature: number): void {
  if (!isFiniteNumber(temperature)) return;
  state.internal = clamp(temperature, TEMPERATURE_CONSTANTS.MIN_SET_C, TEMPERATURE_CONSTANTS.MAX_PILE_C);
}
