// ==============================================================================
// COMPOST SIM TYPES
// Options and report shapes for the scripted pile simulator.
// ==============================================================================

import type { PileEvent } from '@events/types'
import type { HarvestResult, PileTelemetry } from '@system/engine'

// ----------------------------------------------------------
// CLIMATE
// ----------------------------------------------------------

/**
 * Repeating daily weather
 */
export interface ClimateScript {
  /** Mean air temperature in °C */
  baseTemperature: number
  /** Peak-to-mean swing in °C, warmest at 15:00 */
  dailySwing: number
  /** Hours of the day (0-23) with rain */
  rainHours: number[]
  /** Rainfall intensity during rain hours, 0..1 */
  rainfall: number
}

// ----------------------------------------------------------
// RUN OPTIONS
// ----------------------------------------------------------

export interface SimulationOptions {
  /** Game hour the pile is filled at */
  startHour: number
  /** Hours to simulate after filling */
  hours: number
  greens: number
  browns: number
  /** Turn every N hours when the cooldown allows, 0 to never turn */
  turnEvery: number
  /** Water whenever moisture drops below this level, 0 to never water */
  waterBelow: number
  rainExposed: boolean
  /** Snapshot every N hours; the last hour is always included */
  reportEvery: number
  /** Harvest at the end of the run */
  harvest: boolean
  climate: ClimateScript
}

// ----------------------------------------------------------
// REPORT
// ----------------------------------------------------------

export interface SimulationSnapshot {
  hour: number
  telemetry: PileTelemetry
}

export interface SimulationReport {
  accepted: { green: number; brown: number }
  snapshots: SimulationSnapshot[]
  events: PileEvent[]
  /** Game hour the pile finished, null if it never did */
  finishedAt: number | null
  turns: number
  waterings: number
  harvest: HarvestResult | null
}
