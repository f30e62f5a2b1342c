/**
 * Composting engine
 *
 * Orchestrates one pile: moisture, aeration and temperature are advanced in
 * that order on every update, then their modifiers and the C:N modifier set
 * the decomposition rate. Turning, watering and harvest are applied on top.
 *
 * The engine owns no items. Counts are read from the material source on
 * every query.
 */

import {
  getAerationModifier,
  getAerationState,
  getHoursSinceLastTurn,
  turnAeration,
  updateAeration,
  beginAeration
} from '@core/aeration';
import {
  calculateCNRatio,
  getCNModifier,
  getCNRatioQualityText
} from '@core/material-ratio';
import {
  addDryMaterial as dryMoisture,
  addWater as wetMoisture,
  beginMoisture,
  getMoistureModifier,
  getMoistureState,
  isTooWet,
  updateMoisture
} from '@core/moisture';
import {
  applyTurningCooling,
  beginTemperature,
  getEvaporationMultiplier,
  getTemperatureAboveAmbient,
  getTemperatureModifier,
  getTemperatureState,
  updateTemperature
} from '@core/temperature';
import { describePileEvent } from '@events/helpers';
import { EVENT_NAMES } from '@events/types';
import type { PileEvent } from '@events/types';
import { fmtCelsius, fmtPercent } from '@logging';
import {
  createInitialPileState,
  resetPileState,
  restorePileState,
  serializePileState
} from '@system/state';
import type { RestoreResult } from '@system/state';
import type { CompostConfig, Hours, MaterialKind } from '$types';
import { ConfigValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import { calculateHoursDelta } from '@utils/time';
import { validateConfig } from '@validation';

import {
  calculateActivityLevel,
  calculateDecompositionRate,
  calculateRemainingHours,
  calculateTurnDrying,
  isProgressComplete,
  toProgressPercent
} from './helpers';
import type {
  CompostEngine,
  EngineDependencies,
  HarvestResult,
  PileStatus,
  PileTelemetry,
  RateModifiers
} from './types';

/**
 * Create a composting engine for one pile
 *
 * @param config - Complete configuration
 * @param deps - Environment, material source and optional logger/listener
 * @returns Engine over a fresh inactive pile
 * @throws {ConfigValidationError} If the configuration fails validation
 *
 * @example
 * ```typescript
 * const store = createMaterialStore(CONFIG);
 * const engine = createCompostEngine(CONFIG, { environment: world, materials: store });
 * engine.addMaterial(4, 'green');
 * engine.update();
 * ```
 */
export function createCompostEngine(config: CompostConfig, deps: EngineDependencies): CompostEngine {
  const validation = validateConfig(config);
  if (!validation.valid) {
    const fields = validation.errors.map((e) => e.field);
    throw new ConfigValidationError(
      'Invalid compost configuration: ' + validation.errors.map((e) => e.message).join('; '),
      fields
    );
  }

  const env = deps.environment;
  const materials = deps.materials;
  const logger = deps.logger;
  const state = createInitialPileState();

  for (const warning of validation.warnings) {
    logger?.warning("Config: " + warning.message);
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNAL HELPERS
  // ═══════════════════════════════════════════════════════════════

  function emit(event: PileEvent): void {
    logger?.info(describePileEvent(event));
    if (deps.onEvent) {
      deps.onEvent(event);
    }
  }

  function fillRatio(): number {
    return materials.capacity > 0 ? materials.totalCount() / materials.capacity : 0;
  }

  function isEmpty(): boolean {
    return materials.totalCount() === 0;
  }

  function getStatus(): PileStatus {
    if (state.startTime === null) return 'inactive';
    return state.finished ? 'finished' : 'active';
  }

  function cnRatio(): number {
    return calculateCNRatio(materials.greenCount(), materials.brownCount(), config);
  }

  function cnModifier(): number {
    return getCNModifier(cnRatio(), config);
  }

  function getModifiers(): RateModifiers {
    return {
      cn: cnModifier(),
      moisture: getMoistureModifier(state.moisture.level),
      aeration: getAerationModifier(state.aeration.level),
      temperature: getTemperatureModifier(state.temperature.internal)
    };
  }

  function currentRate(): number {
    return calculateDecompositionRate(config.HOURS_TO_COMPLETE, getModifiers());
  }

  function elapsedHours(): number {
    if (state.startTime === null) return 0;
    return Math.floor(calculateHoursDelta(env.now(), state.startTime));
  }

  /**
   * Clamp progress and flag completion (MUTABLE)
   * @returns True if this call finished the pile
   */
  function checkFinished(now: Hours): boolean {
    if (state.finished || !isProgressComplete(state.progress)) return false;

    state.progress = 1;
    state.finished = true;
    emit({ type: EVENT_NAMES.FINISHED, timestamp: now, elapsedHours: elapsedHours() });
    return true;
  }

  function canTurn(): boolean {
    if (getStatus() !== 'active' || isEmpty()) return false;
    return env.now() - state.lastTurnTime >= config.TURN_COOLDOWN_HOURS;
  }

  function turnCooldownRemaining(): number {
    return Math.max(0, config.TURN_COOLDOWN_HOURS - (env.now() - state.lastTurnTime));
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  function start(): boolean {
    if (state.startTime !== null || isEmpty()) return false;

    const now = env.now();
    state.startTime = now;
    state.lastUpdateTime = now;
    state.lastTurnTime = now;

    beginMoisture(state.moisture, now);
    beginAeration(state.aeration, now);
    beginTemperature(state.temperature, now, env.ambientClimate());

    emit({ type: EVENT_NAMES.STARTED, timestamp: now, itemCount: materials.totalCount() });
    return true;
  }

  function addMaterial(count: number, kind: MaterialKind = 'green'): number {
    if (state.finished) {
      logger?.debug("Material rejected: pile is finished");
      return 0;
    }

    const accepted = materials.add(kind, count);
    if (accepted > 0 && state.startTime === null) {
      start();
    }
    return accepted;
  }

  function update(now: Hours = env.now()): boolean {
    if (getStatus() !== 'active' || isEmpty()) return false;

    const hours = calculateHoursDelta(now, state.lastUpdateTime);
    if (hours <= 0) return false;

    // Multiplier from the previous temperature update
    const evaporationMultiplier = getEvaporationMultiplier(state.temperature.internal, state.temperature.ambient);
    const climate = env.ambientClimate();

    updateMoisture(state.moisture, now, evaporationMultiplier, {
      climate: climate,
      rainExposed: env.isRainExposed()
    });
    updateAeration(state.aeration, now, state.moisture.level);

    const fill = fillRatio();
    const heated = updateTemperature(
      state.temperature,
      now,
      {
        activity: calculateActivityLevel(fill, config.SMALL_PILE_FILL_RATIO),
        moistureLevel: state.moisture.level,
        aerationLevel: state.aeration.level,
        cnModifier: cnModifier(),
        pileSize: fill
      },
      climate
    );

    const rate = currentRate();
    state.progress += rate * hours;

    if (heated) {
      logger?.debug(
        "Tick: +" + hours.toFixed(2) + "h, rate=" + (rate * 100).toFixed(3) + "%/h" +
        ", moisture=" + fmtPercent(state.moisture.level) +
        ", aeration=" + fmtPercent(state.aeration.level) +
        ", pile=" + fmtCelsius(state.temperature.internal) +
        ", ambient=" + fmtCelsius(state.temperature.ambient)
      );
    }

    checkFinished(now);
    state.lastUpdateTime = now;
    return true;
  }

  function harvest(): HarvestResult {
    const now = env.now();
    const wasFinished = state.finished;
    const itemsRemoved = materials.clear();
    const compostYield = wasFinished ? Math.floor(itemsRemoved * config.OUTPUT_PER_ITEM) : 0;

    resetPileState(state);

    emit({
      type: EVENT_NAMES.HARVESTED,
      timestamp: now,
      itemsRemoved: itemsRemoved,
      compostYield: compostYield,
      wasFinished: wasFinished
    });

    return { itemsRemoved: itemsRemoved, compostYield: compostYield };
  }

  function reset(): void {
    resetPileState(state);
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERVENTIONS
  // ═══════════════════════════════════════════════════════════════

  function turn(speedupHours: number = config.TURN_SPEEDUP_HOURS): boolean {
    if (getStatus() !== 'active' || isEmpty()) return false;

    const now = env.now();
    const speedup = isFiniteNumber(speedupHours) ? Math.max(0, speedupHours) : 0;

    state.progress += speedup / config.HOURS_TO_COMPLETE;
    const finishedNow = isProgressComplete(state.progress);
    if (finishedNow) {
      state.progress = 1;
    }

    state.lastTurnTime = now;
    turnAeration(state.aeration, now);
    dryMoisture(
      state.moisture,
      calculateTurnDrying(
        state.moisture.level,
        isTooWet(state.moisture.level),
        config.TURN_DAMP_THRESHOLD,
        config.TURN_WET_DRYING,
        config.TURN_DAMP_DRYING
      )
    );
    applyTurningCooling(state.temperature);

    emit({ type: EVENT_NAMES.TURNED, timestamp: now, speedupHours: speedup, progress: state.progress });
    if (finishedNow) {
      checkFinished(now);
    }
    return true;
  }

  function addWater(amount: number = config.WATER_AMOUNT): boolean {
    if (getStatus() !== 'active') return false;
    wetMoisture(state.moisture, amount);
    return true;
  }

  function addDryMaterial(amount: number = config.DRY_MATERIAL_AMOUNT): boolean {
    if (getStatus() !== 'active') return false;
    dryMoisture(state.moisture, amount);
    return true;
  }

  // ═══════════════════════════════════════════════════════════════
  // TELEMETRY
  // ═══════════════════════════════════════════════════════════════

  function remainingHours(): number {
    if (isEmpty() || state.finished) return 0;
    return calculateRemainingHours(state.progress, currentRate(), config.REMAINING_HOURS_SENTINEL);
  }

  function getTelemetry(): PileTelemetry {
    const ratio = cnRatio();

    return {
      status: getStatus(),
      progressPercent: toProgressPercent(state.progress),
      remainingHours: remainingHours(),
      elapsedHours: elapsedHours(),
      ratePerHour: currentRate(),
      modifiers: getModifiers(),

      itemCount: materials.totalCount(),
      greenCount: materials.greenCount(),
      brownCount: materials.brownCount(),
      fillRatio: fillRatio(),

      cnRatio: ratio,
      cnQuality: getCNRatioQualityText(ratio, config),

      moistureLevel: state.moisture.level,
      moistureState: getMoistureState(state.moisture.level),

      aerationLevel: state.aeration.level,
      aerationState: getAerationState(state.aeration.level),
      hoursSinceLastTurn: getHoursSinceLastTurn(state.aeration, env.now()),

      temperature: state.temperature.internal,
      ambientTemperature: state.temperature.ambient,
      temperatureState: getTemperatureState(state.temperature.internal),

      canTurn: canTurn(),
      turnCooldownRemaining: turnCooldownRemaining()
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // PERSISTENCE
  // ═══════════════════════════════════════════════════════════════

  function fromState(record: unknown): RestoreResult {
    const result = restorePileState(state, record);

    if (result.kind === 'legacy_reset') {
      const removed = materials.clear();
      logger?.warning("Saved pile predates the environmental models, discarded " + removed + " items");
      emit({ type: EVENT_NAMES.LEGACY_RESET, timestamp: env.now(), reason: result.reason });
    }

    return result;
  }

  return {
    addMaterial: addMaterial,
    start: start,
    update: update,
    harvest: harvest,
    reset: reset,

    turn: turn,
    canTurn: canTurn,
    turnCooldownRemaining: turnCooldownRemaining,
    addWater: addWater,
    addDryMaterial: addDryMaterial,

    getStatus: getStatus,
    isFinished: () => state.finished,
    progressPercent: () => toProgressPercent(state.progress),
    remainingHours: remainingHours,
    elapsedHours: elapsedHours,
    currentRate: currentRate,
    getModifiers: getModifiers,
    speedMultiplier: cnModifier,

    cnRatio: cnRatio,
    cnModifier: cnModifier,
    cnRatioQualityText: () => getCNRatioQualityText(cnRatio(), config),

    moistureLevel: () => state.moisture.level,
    moistureState: () => getMoistureState(state.moisture.level),
    aerationLevel: () => state.aeration.level,
    aerationState: () => getAerationState(state.aeration.level),
    temperature: () => state.temperature.internal,
    ambientTemperature: () => state.temperature.ambient,
    temperatureAboveAmbient: () => getTemperatureAboveAmbient(state.temperature.internal, state.temperature.ambient),
    temperatureState: () => getTemperatureState(state.temperature.internal),

    getTelemetry: getTelemetry,

    toState: () => serializePileState(state),
    fromState: fromState
  };
}
