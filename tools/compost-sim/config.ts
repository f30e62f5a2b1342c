/**
 * Configuration Management
 * Environment settings and JSON overrides for the simulator
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'

import * as dotenv from 'dotenv'

import type { CompostUserConfig } from '$types'
import { isFiniteNumber, isInteger } from '@utils/number'

// Load .env file from project root
// ? Use override:true to ensure .env values take precedence over system env vars
dotenv.config({
  path: fileURLToPath(new URL('../../.env', import.meta.url)),
  override: true,
})

export interface SimEnvConfig {
  /** Default number of hours to simulate */
  hours: number
  /** Overrides both GLOBAL_LOG_LEVEL and CONSOLE_LOG_LEVEL */
  logLevel?: number
  /** JSON file of USER_CONFIG overrides */
  configPath?: string
}

export interface OverrideResult {
  overrides: Partial<CompostUserConfig>
  errors: string[]
}

// ----------------------------------------------------------
// OVERRIDE KEYS
// ----------------------------------------------------------

type UserKeysOfType<T> = {
  [K in keyof CompostUserConfig]: CompostUserConfig[K] extends T ? K : never
}[keyof CompostUserConfig]

type MutableOverrides = { -readonly [K in keyof CompostUserConfig]?: CompostUserConfig[K] }

const NUMBER_KEYS: readonly UserKeysOfType<number>[] = [
  'MAX_CAPACITY',
  'BULK_ADD_AMOUNT',
  'HOURS_TO_COMPLETE',
  'TURN_SPEEDUP_HOURS',
  'TURN_COOLDOWN_HOURS',
  'OUTPUT_PER_ITEM',
  'GREEN_CN_RATIO',
  'BROWN_CN_RATIO',
  'OPTIMAL_CN_RATIO',
  'OPTIMAL_RATIO_BONUS',
  'POOR_RATIO_PENALTY',
  'WATER_AMOUNT',
  'DRY_MATERIAL_AMOUNT',
  'CONSOLE_LOG_LEVEL',
  'CONSOLE_BUFFER_SIZE',
  'CONSOLE_INTERVAL_MS',
  'GLOBAL_LOG_LEVEL',
  'GLOBAL_LOG_AUTO_DEMOTE_HOURS',
]

const BOOLEAN_KEYS: readonly UserKeysOfType<boolean>[] = ['CONSOLE_ENABLED']

const LIST_KEYS: readonly UserKeysOfType<readonly string[]>[] = [
  'GREEN_ITEM_CODES',
  'GREEN_ITEM_PREFIXES',
  'BROWN_ITEM_CODES',
  'BROWN_ITEM_PREFIXES',
]

const KNOWN_KEYS = new Set<string>([...NUMBER_KEYS, ...BOOLEAN_KEYS, ...LIST_KEYS])

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

/**
 * Pick typed USER_CONFIG overrides out of parsed JSON
 * Values are type-checked only; ranges are left to validateConfig
 */
export function parseOverrides(raw: unknown): OverrideResult {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { overrides: {}, errors: ['Config file must contain a JSON object'] }
  }

  const fields = new Map<string, unknown>(Object.entries(raw))
  const overrides: MutableOverrides = {}
  const errors: string[] = []

  for (const key of fields.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push(`Unknown config key "${key}"`)
    }
  }

  for (const key of NUMBER_KEYS) {
    if (!fields.has(key)) continue
    const value = fields.get(key)
    if (isFiniteNumber(value)) {
      overrides[key] = value
    } else {
      errors.push(`${key} must be a number`)
    }
  }

  for (const key of BOOLEAN_KEYS) {
    if (!fields.has(key)) continue
    const value = fields.get(key)
    if (typeof value === 'boolean') {
      overrides[key] = value
    } else {
      errors.push(`${key} must be true or false`)
    }
  }

  for (const key of LIST_KEYS) {
    if (!fields.has(key)) continue
    const value = fields.get(key)
    if (isStringList(value)) {
      overrides[key] = value
    } else {
      errors.push(`${key} must be a list of strings`)
    }
  }

  return { overrides, errors }
}

class ConfigManager {
  private config: SimEnvConfig

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(env)
  }

  private loadConfig(env: NodeJS.ProcessEnv): SimEnvConfig {
    return {
      hours: Number(env.COMPOST_HOURS || '480'),
      logLevel: env.COMPOST_LOG_LEVEL ? Number(env.COMPOST_LOG_LEVEL) : undefined,
      configPath: env.COMPOST_CONFIG_PATH || undefined,
    }
  }

  /**
   * Problems with the environment settings, empty when usable
   */
  validate(): string[] {
    const errors: string[] = []

    if (!isInteger(this.config.hours) || this.config.hours < 1) {
      errors.push('COMPOST_HOURS must be a positive integer')
    }

    const level = this.config.logLevel
    if (level !== undefined && (!isInteger(level) || level < 0 || level > 3)) {
      errors.push('COMPOST_LOG_LEVEL must be 0 (DEBUG) to 3 (CRITICAL)')
    }

    return errors
  }

  /**
   * Read USER_CONFIG overrides from a JSON file, relative to the working directory
   */
  loadUserConfig(filePath: string): OverrideResult {
    let raw: unknown
    try {
      raw = JSON.parse(fs.readFileSync(path.resolve(filePath), 'utf-8'))
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return { overrides: {}, errors: [`Cannot read ${filePath}: ${reason}`] }
    }

    return parseOverrides(raw)
  }

  get(): SimEnvConfig {
    return { ...this.config }
  }
}

// Export for convenience
export const getConfig = () => new ConfigManager().get()

// Export the class
export { ConfigManager }
