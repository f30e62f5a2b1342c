/**
 * Pile lifecycle events
 *
 * The engine reports lifecycle transitions through an optional listener.
 * Listeners run synchronously inside the call that caused the transition.
 */

import type { Hours } from '$types';

/**
 * Event type tags
 */
export const EVENT_NAMES = {
  STARTED: 'pile_started',
  TURNED: 'pile_turned',
  FINISHED: 'pile_finished',
  HARVESTED: 'pile_harvested',
  LEGACY_RESET: 'pile_legacy_reset'
} as const;

export type PileEventName = typeof EVENT_NAMES[keyof typeof EVENT_NAMES];

/**
 * Emitted once when a pile with material starts decomposing
 */
export interface PileStartedEvent {
  type: typeof EVENT_NAMES.STARTED;
  timestamp: Hours;
  itemCount: number;
}

/**
 * Emitted after each applied turn
 */
export interface PileTurnedEvent {
  type: typeof EVENT_NAMES.TURNED;
  timestamp: Hours;
  speedupHours: number;

  /** Progress (0..1) after the turn bonus */
  progress: number;
}

/**
 * Emitted when progress saturates, from either update or turn
 */
export interface PileFinishedEvent {
  type: typeof EVENT_NAMES.FINISHED;
  timestamp: Hours;
  elapsedHours: number;
}

/**
 * Emitted when the pile is emptied
 */
export interface PileHarvestedEvent {
  type: typeof EVENT_NAMES.HARVESTED;
  timestamp: Hours;
  itemsRemoved: number;
  compostYield: number;
  wasFinished: boolean;
}

/**
 * Why a saved state was discarded
 * - legacy_key: record carries the retired isComposting flag
 * - missing_model_fields: record is started but has no moisture/aeration/temperature fields
 */
export type LegacyResetReason = 'legacy_key' | 'missing_model_fields';

/**
 * Emitted when restoring an incompatible saved state
 */
export interface PileLegacyResetEvent {
  type: typeof EVENT_NAMES.LEGACY_RESET;
  timestamp: Hours;
  reason: LegacyResetReason;
}

export type PileEvent =
  | PileStartedEvent
  | PileTurnedEvent
  | PileFinishedEvent
  | PileHarvestedEvent
  | PileLegacyResetEvent;

export type PileEventListener = (event: PileEvent) => void;
