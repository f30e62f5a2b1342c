/**
 * Composting engine type definitions
 */

import type { AerationBand } from '@core/aeration';
import type { MoistureBand } from '@core/moisture';
import type { RatioQualityText } from '@core/material-ratio';
import type { TemperatureBand } from '@core/temperature';
import type { PileEventListener } from '@events/types';
import type { MaterialSource } from '@features/material-store';
import type { Logger } from '@logging';
import type { RestoreResult, SerializedPileState } from '@system/state';
import type { ClimateSample, Hours, MaterialKind } from '$types';

/**
 * World the pile lives in
 *
 * All queries are synchronous and read the current game state.
 */
export interface PileEnvironment {
  /** Current game-clock hours */
  now(): Hours;

  /** Air temperature and rainfall at the pile */
  ambientClimate(): ClimateSample;

  /** Whether rain can reach the pile */
  isRainExposed(): boolean;
}

/**
 * Engine external dependencies
 */
export interface EngineDependencies {
  environment: PileEnvironment;
  materials: MaterialSource;
  logger?: Logger;
  onEvent?: PileEventListener;
}

export type PileStatus = 'inactive' | 'active' | 'finished';

export interface HarvestResult {
  itemsRemoved: number;

  /** Finished compost produced, 0 when harvested early */
  compostYield: number;
}

/**
 * Per-model decomposition modifiers
 */
export interface RateModifiers {
  cn: number;
  moisture: number;
  aeration: number;
  temperature: number;
}

/**
 * Snapshot of everything the engine can report
 */
export interface PileTelemetry {
  status: PileStatus;
  progressPercent: number;
  remainingHours: number;
  elapsedHours: number;
  ratePerHour: number;
  modifiers: RateModifiers;

  itemCount: number;
  greenCount: number;
  brownCount: number;
  fillRatio: number;

  cnRatio: number;
  cnQuality: RatioQualityText;

  moistureLevel: number;
  moistureState: MoistureBand;

  aerationLevel: number;
  aerationState: AerationBand;
  hoursSinceLastTurn: number;

  temperature: number;
  ambientTemperature: number;
  temperatureState: TemperatureBand;

  canTurn: boolean;
  turnCooldownRemaining: number;
}

/**
 * One compost pile
 */
export interface CompostEngine {
  // ───────── LIFECYCLE ─────────
  /**
   * Deposit material and start the pile on its first item
   *
   * One call accepts at most BULK_ADD_AMOUNT items and never more than the
   * remaining capacity; loop to deposit a larger batch.
   *
   * @returns Items accepted by the material source
   */
  addMaterial(count: number, kind?: MaterialKind): number;
  start(): boolean;
  update(now?: Hours): boolean;
  harvest(): HarvestResult;
  reset(): void;

  // ───────── INTERVENTIONS ─────────
  turn(speedupHours?: number): boolean;
  canTurn(): boolean;
  turnCooldownRemaining(): number;
  addWater(amount?: number): boolean;
  addDryMaterial(amount?: number): boolean;

  // ───────── TELEMETRY ─────────
  getStatus(): PileStatus;
  isFinished(): boolean;
  progressPercent(): number;
  remainingHours(): number;
  elapsedHours(): number;
  currentRate(): number;
  getModifiers(): RateModifiers;
  speedMultiplier(): number;

  cnRatio(): number;
  cnModifier(): number;
  cnRatioQualityText(): RatioQualityText;

  moistureLevel(): number;
  moistureState(): MoistureBand;
  aerationLevel(): number;
  aerationState(): AerationBand;
  temperature(): number;
  ambientTemperature(): number;
  temperatureAboveAmbient(): number;
  temperatureState(): TemperatureBand;

  getTelemetry(): PileTelemetry;

  // ───────── PERSISTENCE ─────────
  toState(): SerializedPileState;
  fromState(record: unknown): RestoreResult;
}
