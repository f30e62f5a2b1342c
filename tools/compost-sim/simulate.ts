/**
 * Scripted Pile Simulation
 * Drives one pile through game hours against a repeating daily climate
 */

import type { PileEvent } from '@events/types'
import { createMaterialStore } from '@features/material-store'
import type { Logger } from '@logging'
import { createCompostEngine } from '@system/engine'
import type { CompostEngine } from '@system/engine'
import type { ClimateSample, CompostConfig, MaterialKind } from '$types'
import { TIME_CONSTANTS } from '@utils/constants'

import type { ClimateScript, SimulationOptions, SimulationReport, SimulationSnapshot } from './types'

const HOURS_PER_DAY = TIME_CONSTANTS.HOURS_PER_DAY
const WARMEST_HOUR = 15

/**
 * Game world with a manual clock and a repeating daily climate
 */
export class ScriptedWorld {
  private hour: number

  constructor(private readonly climate: ClimateScript, private readonly rainExposed: boolean, startHour: number) {
    this.hour = startHour
  }

  now(): number {
    return this.hour
  }

  advance(hours: number): void {
    this.hour += hours
  }

  ambientClimate(): ClimateSample {
    const hourOfDay = ((this.hour % HOURS_PER_DAY) + HOURS_PER_DAY) % HOURS_PER_DAY
    // Peak at WARMEST_HOUR, trough twelve hours later
    const phase = ((hourOfDay - WARMEST_HOUR + 6) / HOURS_PER_DAY) * 2 * Math.PI

    return {
      temperature: this.climate.baseTemperature + this.climate.dailySwing * Math.sin(phase),
      rainfall: this.climate.rainHours.includes(Math.floor(hourOfDay)) ? this.climate.rainfall : 0,
    }
  }

  isRainExposed(): boolean {
    return this.rainExposed
  }
}

export class PileSimulation {
  private readonly world: ScriptedWorld
  private readonly engine: CompostEngine
  private readonly events: PileEvent[] = []

  constructor(
    config: CompostConfig,
    private readonly options: SimulationOptions,
    logger?: Logger,
    private readonly afterHour?: () => void,
  ) {
    this.world = new ScriptedWorld(options.climate, options.rainExposed, options.startHour)
    this.engine = createCompostEngine(config, {
      environment: this.world,
      materials: createMaterialStore(config),
      logger: logger,
      onEvent: (event) => this.events.push(event),
    })
  }

  run(): SimulationReport {
    const accepted = {
      green: this.fill('green', this.options.greens),
      brown: this.fill('brown', this.options.browns),
    }

    const snapshots: SimulationSnapshot[] = []
    let finishedAt: number | null = null
    let turns = 0
    let waterings = 0

    for (let elapsed = 1; elapsed <= this.options.hours; elapsed++) {
      this.world.advance(1)
      this.engine.update()

      if (this.shouldTurn(elapsed) && this.engine.turn()) {
        turns++
      }

      if (this.shouldWater() && this.engine.addWater()) {
        waterings++
      }

      const done = this.engine.isFinished()
      if (done && finishedAt === null) {
        finishedAt = this.world.now()
      }

      if (elapsed % this.options.reportEvery === 0 || elapsed === this.options.hours || done) {
        snapshots.push({ hour: this.world.now(), telemetry: this.engine.getTelemetry() })
      }

      if (this.afterHour) this.afterHour()
      if (done) break
    }

    return {
      accepted,
      snapshots,
      events: this.events,
      finishedAt,
      turns,
      waterings,
      harvest: this.options.harvest ? this.engine.harvest() : null,
    }
  }

  /**
   * Deposit in bulk-limited batches until the store stops accepting
   */
  private fill(kind: MaterialKind, count: number): number {
    let accepted = 0

    while (accepted < count) {
      const batch = this.engine.addMaterial(count - accepted, kind)
      if (batch === 0) break
      accepted += batch
    }

    return accepted
  }

  private shouldTurn(elapsed: number): boolean {
    return this.options.turnEvery > 0 && elapsed % this.options.turnEvery === 0 && this.engine.canTurn()
  }

  private shouldWater(): boolean {
    return this.options.waterBelow > 0 &&
      this.engine.getStatus() === 'active' &&
      this.engine.moistureLevel() < this.options.waterBelow
  }
}

/**
 * Run a simulation end to end
 *
 * @throws {ConfigValidationError} If the configuration fails validation
 */
export function runSimulation(
  config: CompostConfig,
  options: SimulationOptions,
  logger?: Logger,
  afterHour?: () => void,
): SimulationReport {
  return new PileSimulation(config, options, logger, afterHour).run()
}
