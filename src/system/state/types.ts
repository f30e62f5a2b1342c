/**
 * Pile state type definitions
 */

import type { AerationState } from '@core/aeration';
import type { MoistureState } from '@core/moisture';
import type { TemperatureState } from '@core/temperature';
import type { LegacyResetReason } from '@events/types';
import type { Hours } from '$types';

/**
 * Complete mutable state of one pile
 */
export interface PileState {
    // ═══════════════════════════════════════════════════════════════
    // LIFECYCLE
    // ═══════════════════════════════════════════════════════════════
    startTime: Hours | null;
    lastUpdateTime: Hours;
    lastTurnTime: Hours;
    progress: number;
    finished: boolean;

    // ═══════════════════════════════════════════════════════════════
    // ENVIRONMENTAL MODELS
    // ═══════════════════════════════════════════════════════════════
    moisture: MoistureState;
    aeration: AerationState;
    temperature: TemperatureState;
}

/**
 * Flat persisted form of a pile
 *
 * An inactive pile is saved with startTime -1.
 */
export interface SerializedPileState {
    startTime: number;
    lastUpdateTime: number;
    lastTurnTime: number;
    decompositionProgress: number;
    isFinished: boolean;
    moistureLevel: number;
    moistureLastCheck: number;
    aerationLevel: number;
    aerationLastUpdate: number;
    aerationLastTurn: number;
    internalTemperature: number;
    ambientTemperature: number;
    temperatureLastUpdate: number;
}

/**
 * Outcome of restoring a saved record
 */
export type RestoreResult =
    | { kind: 'restored' }
    | { kind: 'legacy_reset'; reason: LegacyResetReason };
