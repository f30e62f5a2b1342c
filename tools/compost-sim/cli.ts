#!/usr/bin/env tsx
/**
 * Compost Pile Simulator
 * Runs one pile through scripted weather and prints its telemetry
 */

import chalk from 'chalk'
import { InvalidArgumentError, program } from 'commander'

import { resolveConfig } from '@boot/config'
import { initialize } from '@boot/init'
import { createNodeTimer } from '@boot/timer'
import type { PileTelemetry } from '@system/engine'
import type { CompostUserConfig } from '$types'
import { ConfigValidationError } from '$types/errors'
import { formatGameTime, now } from '@utils/time'

import { ConfigManager } from './config'
import { runSimulation } from './simulate'
import type { SimulationOptions, SimulationReport } from './types'

function parseCount(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

function parseDecimal(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.')
  }
  return parsed
}

interface CliOptions {
  hours?: number
  greens: number
  browns: number
  turnEvery: number
  waterBelow: number
  rain: boolean
  temp: number
  swing: number
  reportEvery: number
  harvest: boolean
  config?: string
  verbose: boolean
}

// Parse command line arguments
program
  .name('compost-sim')
  .description('Simulate a compost pile hour by hour')
  .option('-H, --hours <n>', 'Hours to simulate (default: COMPOST_HOURS or 480)', parseCount)
  .option('-g, --greens <n>', 'Green items to add', parseCount, 24)
  .option('-b, --browns <n>', 'Brown items to add', parseCount, 8)
  .option('-t, --turn-every <n>', 'Turn every N hours, 0 to never turn', parseCount, 24)
  .option('-w, --water-below <level>', 'Water when moisture drops below level, 0 to never water', parseDecimal, 0.35)
  .option('--rain', 'Leave the pile exposed to rain', false)
  .option('--temp <c>', 'Mean air temperature in °C', parseDecimal, 18)
  .option('--swing <c>', 'Daily temperature swing in °C', parseDecimal, 6)
  .option('-r, --report-every <n>', 'Print a row every N hours', parseCount, 24)
  .option('--harvest', 'Harvest at the end of the run', false)
  .option('-c, --config <file>', 'JSON file of USER_CONFIG overrides')
  .option('-v, --verbose', 'Log every tick (DEBUG)', false)
  .parse(process.argv)

const options = program.opts<CliOptions>()

class CompostSimCli {
  private readonly env = new ConfigManager()

  run(): void {
    const envErrors = this.env.validate()
    if (envErrors.length > 0) {
      this.fail('Environment errors:', envErrors)
      return
    }

    const overrides = this.loadOverrides()
    if (overrides === null) return

    const config = resolveConfig(overrides)
    const runtime = initialize(config, { timer: createNodeTimer(), console: console, timeSource: now })
    if (!runtime) {
      process.exitCode = 1
      return
    }

    let report: SimulationReport
    try {
      report = runSimulation(config, this.simulationOptions(), runtime.logger, () => runtime.consoleSink.flush())
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.fail(error.message, error.fields)
        return
      }
      throw error
    } finally {
      runtime.consoleSink.dispose()
    }

    this.printReport(report)
  }

  private loadOverrides(): Partial<CompostUserConfig> | null {
    const envConfig = this.env.get()
    const configPath = options.config ?? envConfig.configPath
    const logLevel = options.verbose ? 0 : envConfig.logLevel

    let fileOverrides: Partial<CompostUserConfig> = {}
    if (configPath) {
      const loaded = this.env.loadUserConfig(configPath)
      if (loaded.errors.length > 0) {
        this.fail(`Config file errors (${configPath}):`, loaded.errors)
        return null
      }
      fileOverrides = loaded.overrides
    }

    return { ...fileOverrides, GLOBAL_LOG_LEVEL: logLevel, CONSOLE_LOG_LEVEL: logLevel }
  }

  private simulationOptions(): SimulationOptions {
    return {
      startHour: 8,
      hours: options.hours ?? this.env.get().hours,
      greens: options.greens,
      browns: options.browns,
      turnEvery: options.turnEvery,
      waterBelow: options.waterBelow,
      rainExposed: options.rain,
      reportEvery: Math.max(1, options.reportEvery),
      harvest: options.harvest,
      climate: {
        baseTemperature: options.temp,
        dailySwing: options.swing,
        rainHours: [5, 6, 7, 17, 18],
        rainfall: 0.4,
      },
    }
  }

  private printReport(report: SimulationReport): void {
    console.log('\n' + chalk.cyan('═'.repeat(78)))
    console.log(chalk.cyan.bold(
      `Pile: ${report.accepted.green} green + ${report.accepted.brown} brown`,
    ))
    console.log(chalk.cyan('═'.repeat(78)))
    console.log(chalk.gray(
      'time          progress  pile °C  air °C  moisture  aeration  C:N           state',
    ))
    console.log(chalk.gray('─'.repeat(78)))

    for (const snapshot of report.snapshots) {
      console.log(this.formatRow(snapshot.hour, snapshot.telemetry))
    }

    console.log(chalk.gray('─'.repeat(78)))
    console.log(chalk.blue(`Turns: ${report.turns} | Waterings: ${report.waterings}`))

    if (report.finishedAt !== null) {
      console.log(chalk.green(`✓ Finished at ${formatGameTime(report.finishedAt)}`))
    } else {
      const last = report.snapshots[report.snapshots.length - 1]
      const remaining = last ? last.telemetry.remainingHours : 0
      console.log(chalk.yellow(`○ Not finished (about ${remaining}h to go)`))
    }

    if (report.harvest) {
      const colour = report.harvest.compostYield > 0 ? chalk.green : chalk.yellow
      console.log(colour(
        `Harvested ${report.harvest.itemsRemoved} items for ${report.harvest.compostYield} compost`,
      ))
    }

    console.log(chalk.cyan('═'.repeat(78)) + '\n')
  }

  private formatRow(hour: number, t: PileTelemetry): string {
    const progress = `${t.progressPercent}%`.padStart(8)
    const pile = t.temperature.toFixed(1).padStart(7)
    const air = t.ambientTemperature.toFixed(1).padStart(6)
    const moisture = `${Math.round(t.moistureLevel * 100)}%`.padStart(8)
    const aeration = `${Math.round(t.aerationLevel * 100)}%`.padStart(8)
    const ratio = `${t.cnRatio.toFixed(1)} ${t.cnQuality}`.padEnd(13)

    const state = t.status === 'finished' ? chalk.green('finished') : chalk.white(t.temperatureState)
    const line = `${formatGameTime(hour).padEnd(12)}  ${progress}  ${pile}  ${air}  ${moisture}  ${aeration}  ${ratio} `

    return (t.modifiers.moisture < 1 || t.modifiers.aeration < 1 ? chalk.yellow(line) : line) + state
  }

  private fail(title: string, details: string[]): void {
    console.error(chalk.red(`\n✗ ${title}`))
    details.forEach((detail) => console.error(chalk.red(`  - ${detail}`)))
    process.exitCode = 1
  }
}

new CompostSimCli().run()
