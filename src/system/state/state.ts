/**
 * Pile state management
 *
 * Creation, reset and the flat save format. Restoring never throws:
 * unreadable fields fall back to their defaults and incompatible saves
 * are reported so the engine can discard them.
 */

import { createAerationState, resetAeration } from '@core/aeration';
import { createMoistureState, resetMoisture } from '@core/moisture';
import { createTemperatureState, resetTemperature, TEMPERATURE_CONSTANTS } from '@core/temperature';
import { clamp, clamp01, isFiniteNumber } from '@utils/number';

import type { PileState, RestoreResult, SerializedPileState } from './types';

export * from './types';

/**
 * Retired flag carried by saves from before the environmental models existed
 */
const LEGACY_ACTIVE_KEY = 'isComposting';

/**
 * startTime written for a pile that has not started; hour 0 is a valid start
 */
export const INACTIVE_START_TIME = -1;

/**
 * Keys written by the environmental models; a started save without any of
 * them predates the models
 */
const MODEL_FIELD_KEYS: readonly (keyof SerializedPileState)[] = [
  'moistureLevel',
  'moistureLastCheck',
  'aerationLevel',
  'aerationLastUpdate',
  'aerationLastTurn',
  'internalTemperature',
  'ambientTemperature',
  'temperatureLastUpdate'
];

/**
 * Create initial pile state
 *
 * @returns Inactive pile with every model at its default
 *
 * @example
 * ```typescript
 * const state = createInitialPileState();
 * state.startTime; // null
 * ```
 */
export function createInitialPileState(): PileState {
  return {
    startTime: null,         // Inactive until material is added
    lastUpdateTime: 0,
    lastTurnTime: 0,
    progress: 0,
    finished: false,

    moisture: createMoistureState(),
    aeration: createAerationState(),
    temperature: createTemperatureState()
  };
}

/**
 * Reset every block to defaults (MUTABLE)
 *
 * Temperature keeps its last ambient reading and drops internal to it.
 *
 * @param state - Pile state (will be mutated)
 */
export function resetPileState(state: PileState): void {
  state.startTime = null;
  state.lastUpdateTime = 0;
  state.lastTurnTime = 0;
  state.progress = 0;
  state.finished = false;

  resetMoisture(state.moisture);
  resetAeration(state.aeration);
  resetTemperature(state.temperature);
}

/**
 * Flatten pile state for persistence
 * @param state - Pile state
 * @returns Flat record of scalars
 */
export function serializePileState(state: PileState): SerializedPileState {
  return {
    startTime: state.startTime ?? INACTIVE_START_TIME,
    lastUpdateTime: state.lastUpdateTime,
    lastTurnTime: state.lastTurnTime,
    decompositionProgress: state.progress,
    isFinished: state.finished,
    moistureLevel: state.moisture.level,
    moistureLastCheck: state.moisture.lastCheckTime,
    aerationLevel: state.aeration.level,
    aerationLastUpdate: state.aeration.lastUpdateTime,
    aerationLastTurn: state.aeration.lastTurnTime,
    internalTemperature: state.temperature.internal,
    ambientTemperature: state.temperature.ambient,
    temperatureLastUpdate: state.temperature.lastUpdateTime
  };
}

/**
 * Restore pile state from a saved record (MUTABLE)
 *
 * Missing or non-numeric fields take the default of their block. Levels
 * and progress are clamped, and progress at 1 is treated as finished.
 * A startTime of 0 counts as a start at hour 0 unless nothing else on the
 * record has moved.
 * Legacy saves reset the whole pile.
 *
 * @param state - Pile state to overwrite (will be mutated)
 * @param record - Untrusted saved record
 * @returns Whether the record was applied or discarded as legacy
 */
export function restorePileState(state: PileState, record: unknown): RestoreResult {
  const fields = toFieldMap(record);
  const defaults = createInitialPileState();

  resetPileState(state);

  if (fields.has(LEGACY_ACTIVE_KEY)) {
    return { kind: 'legacy_reset', reason: 'legacy_key' };
  }

  const startTime = readNumber(fields, 'startTime', INACTIVE_START_TIME);
  const lastUpdateTime = readNumber(fields, 'lastUpdateTime', 0);
  const lastTurnTime = readNumber(fields, 'lastTurnTime', 0);
  const progress = clamp01(readNumber(fields, 'decompositionProgress', 0));
  const finished = readBoolean(fields, 'isFinished', false) || progress >= 1;

  // Older saves wrote 0 for an inactive pile
  const untouched = lastUpdateTime === 0 && lastTurnTime === 0 && progress === 0 && !finished;
  const started = startTime > 0 || (startTime === 0 && !untouched);

  const hasModelFields = MODEL_FIELD_KEYS.some((key) => fields.has(key));
  if (started && !hasModelFields) {
    return { kind: 'legacy_reset', reason: 'missing_model_fields' };
  }

  state.startTime = started ? startTime : null;
  state.lastUpdateTime = lastUpdateTime;
  state.lastTurnTime = lastTurnTime;
  state.progress = progress;
  state.finished = finished;

  state.moisture.level = clamp01(readNumber(fields, 'moistureLevel', defaults.moisture.level));
  state.moisture.lastCheckTime = readNumber(fields, 'moistureLastCheck', 0);

  state.aeration.level = clamp01(readNumber(fields, 'aerationLevel', defaults.aeration.level));
  state.aeration.lastUpdateTime = readNumber(fields, 'aerationLastUpdate', 0);
  state.aeration.lastTurnTime = readNumber(fields, 'aerationLastTurn', 0);

  // Internal can sit down to the floor below ambient or at the manual minimum
  state.temperature.ambient = readNumber(fields, 'ambientTemperature', defaults.temperature.ambient);
  state.temperature.internal = clamp(
    readNumber(fields, 'internalTemperature', defaults.temperature.internal),
    Math.min(
      TEMPERATURE_CONSTANTS.MIN_SET_C,
      state.temperature.ambient - TEMPERATURE_CONSTANTS.BELOW_AMBIENT_FLOOR_C
    ),
    TEMPERATURE_CONSTANTS.MAX_PILE_C
  );
  state.temperature.lastUpdateTime = readNumber(fields, 'temperatureLastUpdate', 0);

  return { kind: 'restored' };
}

// ═══════════════════════════════════════════════════════════════
// RECORD READERS
// ═══════════════════════════════════════════════════════════════

function toFieldMap(record: unknown): Map<string, unknown> {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    return new Map<string, unknown>();
  }
  return new Map<string, unknown>(Object.entries(record));
}

function readNumber(fields: Map<string, unknown>, key: string, fallback: number): number {
  const value = fields.get(key);
  return isFiniteNumber(value) ? value : fallback;
}

function readBoolean(fields: Map<string, unknown>, key: string, fallback: boolean): boolean {
  const value = fields.get(key);
  return typeof value === 'boolean' ? value : fallback;
}
