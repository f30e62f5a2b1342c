/**
 * Temperature helper functions
 */

import { clamp } from '@utils/number';

import { TEMPERATURE_CONSTANTS } from './types';
import type { TemperatureBand, TemperatureInputs } from './types';

const C = TEMPERATURE_CONSTANTS;

/**
 * Heat produced per hour by microbial activity
 *
 * @param inputs - Pile conditions
 * @returns °C per hour, clamped to [0, MAX_HEAT_GENERATION]
 *
 * @remarks
 * generation = 2 × activity × (1 + aeration × 0.5) × cnModifier × (0.5 + size × 0.5)
 */
export function calculateHeatGeneration(inputs: TemperatureInputs): number {
  const base = C.BASE_HEAT_GENERATION * inputs.activity;
  const aerationBonus = 1 + inputs.aerationLevel * 0.5;
  const sizeBonus = 0.5 + inputs.pileSize * 0.5;

  return clamp(base * aerationBonus * inputs.cnModifier * sizeBonus, 0, C.MAX_HEAT_GENERATION);
}

/**
 * Heat lost per hour to the surroundings
 *
 * Conduction scales with the gap to ambient, reduced up to 30% for a
 * full pile. A pile wetter than 0.5 and warmer than the air also loses
 * heat to evaporation.
 *
 * @param internal - Pile temperature in °C
 * @param ambient - Air temperature in °C
 * @param moistureLevel - Current moisture level
 * @param pileSize - Fill ratio
 * @returns °C per hour (negative when the pile is colder than the air)
 */
export function calculateHeatLoss(
  internal: number,
  ambient: number,
  moistureLevel: number,
  pileSize: number
): number {
  const difference = internal - ambient;
  const conduction = difference * C.HEAT_LOSS_COEFFICIENT * (1 - pileSize * 0.3);

  let evaporative = 0;
  if (moistureLevel > C.EVAPORATIVE_MOISTURE_THRESHOLD && internal > ambient) {
    const excess = moistureLevel - C.EVAPORATIVE_MOISTURE_THRESHOLD;
    evaporative = excess * (difference / C.EVAPORATION_REFERENCE_DELTA_C) * C.EVAPORATIVE_COOLING;
  }

  return conduction + evaporative;
}

/**
 * Decomposition rate modifier for a pile temperature
 *
 * Peaks at 1.5 in the 40–55 °C thermophilic band.
 *
 * @param temperature - Pile temperature in °C
 * @returns Multiplier on the base decomposition rate
 */
export function getTemperatureModifier(temperature: number): number {
  if (temperature < C.FREEZING_ACTIVITY_C) return 0.1;
  if (temperature < C.COLD_C) return 0.3;
  if (temperature < C.TOO_COLD_C) return 0.6;
  if (temperature < C.WARM_C) return 0.9;
  if (temperature < C.THERMOPHILIC_MIN_C) return 1.1;
  if (temperature <= C.PEAK_MAX_C) return 1.5;
  if (temperature <= C.THERMOPHILIC_MAX_C) return 1.3;
  if (temperature <= C.CRITICAL_C) return 0.7;
  return 0.3;
}

export function getTemperatureState(temperature: number): TemperatureBand {
  if (temperature < C.COLD_C) return 'Cold';
  if (temperature < C.TOO_COLD_C) return 'Cool';
  if (temperature < C.WARM_C) return 'Warm';
  if (temperature < C.THERMOPHILIC_MIN_C) return 'Getting Hot';
  if (temperature <= C.THERMOPHILIC_MAX_C) return 'Thermophilic';
  if (temperature <= C.CRITICAL_C) return 'Too Hot';
  return 'Critically Hot';
}

/**
 * Evaporation multiplier from pile heat
 * @param internal - Pile temperature in °C
 * @param ambient - Air temperature in °C
 * @returns 1 at or below ambient, 2 at 50 °C above
 */
export function getEvaporationMultiplier(internal: number, ambient: number): number {
  if (internal <= ambient) return 1;
  return 1 + (internal - ambient) / C.EVAPORATION_REFERENCE_DELTA_C;
}

export function getTemperatureAboveAmbient(internal: number, ambient: number): number {
  return Math.max(0, internal - ambient);
}

export function isThermophilic(temperature: number): boolean {
  return temperature >= C.THERMOPHILIC_MIN_C && temperature <= C.THERMOPHILIC_MAX_C;
}

export function isTooCold(temperature: number): boolean {
  return temperature < C.TOO_COLD_C;
}

export function isTooHot(temperature: number): boolean {
  return temperature > C.THERMOPHILIC_MAX_C;
}
