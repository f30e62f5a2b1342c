import { resolveConfig } from '@boot/config'
import { EVENT_NAMES } from '@events/types'
import { ConfigValidationError } from '$types/errors'

import { ScriptedWorld, runSimulation } from './simulate'
import type { ClimateScript, SimulationOptions } from './types'

const STEADY: ClimateScript = { baseTemperature: 20, dailySwing: 0, rainHours: [], rainfall: 0 }

function options(overrides: Partial<SimulationOptions> = {}): SimulationOptions {
  return {
    startHour: 100,
    hours: 1,
    greens: 10,
    browns: 0,
    turnEvery: 0,
    waterBelow: 0,
    rainExposed: false,
    reportEvery: 1,
    harvest: false,
    climate: STEADY,
    ...overrides,
  }
}

describe('ScriptedWorld', () => {
  const climate: ClimateScript = { baseTemperature: 15, dailySwing: 10, rainHours: [9], rainfall: 0.5 }

  it('should peak at 15:00 and bottom out at 03:00', () => {
    expect(new ScriptedWorld(climate, true, 15).ambientClimate().temperature).toBeCloseTo(25, 10)
    expect(new ScriptedWorld(climate, true, 27).ambientClimate().temperature).toBeCloseTo(5, 10)
    expect(new ScriptedWorld(climate, true, 9).ambientClimate().temperature).toBeCloseTo(15, 10)
  })

  it('should rain only during rain hours, every day', () => {
    const world = new ScriptedWorld(climate, true, 9)
    expect(world.ambientClimate().rainfall).toBe(0.5)

    world.advance(1)
    expect(world.ambientClimate().rainfall).toBe(0)

    world.advance(23)
    expect(world.now()).toBe(33)
    expect(world.ambientClimate().rainfall).toBe(0.5)
  })
})

describe('runSimulation', () => {
  const config = resolveConfig()

  it('should fill in bulk-limited batches and start on the first one', () => {
    const report = runSimulation(config, options())

    expect(report.accepted).toEqual({ green: 10, brown: 0 })
    expect(report.events[0]).toEqual({ type: EVENT_NAMES.STARTED, timestamp: 100, itemCount: 4 })
  })

  it('should stop filling at capacity', () => {
    const report = runSimulation(config, options({ greens: 50, browns: 30, hours: 0 }))

    expect(report.accepted).toEqual({ green: 50, brown: 14 })
    expect(report.snapshots).toEqual([])
  })

  it('should report the first hour of a small green pile', () => {
    const report = runSimulation(config, options())

    expect(report.snapshots).toHaveLength(1)
    const { hour, telemetry } = report.snapshots[0]
    expect(hour).toBe(101)
    expect(telemetry.moistureLevel).toBeCloseTo(0.46, 10)
    expect(telemetry.aerationLevel).toBeCloseTo(0.685, 10)
    expect(telemetry.temperature).toBeCloseTo(20.80847168, 8)
    expect(telemetry.ratePerHour).toBeCloseTo(0.00375, 10)
    expect(report.finishedAt).toBeNull()
    expect(report.harvest).toBeNull()
  })

  it('should snapshot every reportEvery hours and on the last hour', () => {
    const report = runSimulation(config, options({ hours: 10, reportEvery: 4 }))

    expect(report.snapshots.map((s) => s.hour)).toEqual([104, 108, 110])
  })

  it('should add rain to an exposed pile', () => {
    const rainy: ClimateScript = { ...STEADY, rainHours: [5], rainfall: 0.5 }

    const exposed = runSimulation(config, options({ climate: rainy, rainExposed: true }))
    const sheltered = runSimulation(config, options({ climate: rainy, rainExposed: false }))

    // Hour 101 is 05:00
    expect(exposed.snapshots[0].telemetry.moistureLevel).toBeCloseTo(0.546, 10)
    expect(sheltered.snapshots[0].telemetry.moistureLevel).toBeCloseTo(0.46, 10)
  })

  it('should water a pile that drops below the threshold', () => {
    const report = runSimulation(config, options({ waterBelow: 0.5 }))

    expect(report.waterings).toBe(1)
    expect(report.snapshots[0].telemetry.moistureLevel).toBeCloseTo(0.66, 10)
  })

  it('should finish a regularly turned pile and harvest it', () => {
    const report = runSimulation(config, options({ hours: 400, turnEvery: 5, reportEvery: 24, harvest: true }))

    expect(report.finishedAt).not.toBeNull()
    expect(report.finishedAt).toBeLessThanOrEqual(340)
    expect(report.turns).toBeGreaterThan(0)
    expect(report.snapshots[report.snapshots.length - 1].hour).toBe(report.finishedAt)
    expect(report.snapshots[report.snapshots.length - 1].telemetry.status).toBe('finished')
    expect(report.harvest).toEqual({ itemsRemoved: 10, compostYield: 5 })

    const types = report.events.map((e) => e.type)
    expect(types.filter((t) => t === EVENT_NAMES.FINISHED)).toHaveLength(1)
    expect(types[types.length - 1]).toBe(EVENT_NAMES.HARVESTED)
  })

  it('should throw ConfigValidationError for an invalid config', () => {
    const invalid = resolveConfig({ HOURS_TO_COMPLETE: 20000 })

    expect(() => runSimulation(invalid, options())).toThrow(ConfigValidationError)
  })
})

describe('PileSimulation hooks', () => {
  it('should call afterHour once per simulated hour', () => {
    const afterHour = vi.fn()

    runSimulation(resolveConfig(), options({ hours: 6 }), undefined, afterHour)

    expect(afterHour).toHaveBeenCalledTimes(6)
  })
})
