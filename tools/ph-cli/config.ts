/**
 * Configuration Management
 * Maps environment variables onto sensor config overrides
 */

import * as path from 'path'

import * as dotenv from 'dotenv'

import { toLogLevel } from '@logging'

import type { LogLevel } from '@logging'
import type { PhSensorUserConfig } from '$types'

export type ConfigOverrides = { -readonly [K in keyof PhSensorUserConfig]?: PhSensorUserConfig[K] }

export type EnvSource = Record<string, string | undefined>

const LEVEL_NAMES: Record<string, LogLevel> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3,
}

const BOOLEAN_NAMES: Record<string, boolean> = {
  TRUE: true,
  YES: true,
  1: true,
  FALSE: false,
  NO: false,
  0: false,
}

/**
 * Load .env from the project root
 * ? override:false keeps values already exported in the shell
 */
export function loadEnvFile(envPath: string = path.resolve(__dirname, '../../.env')): void {
  dotenv.config({ path: envPath, override: false })
}

class ConfigManager {
  private config: ConfigOverrides
  private errors: string[] = []

  constructor(private env: EnvSource = process.env) {
    this.config = this.loadConfig()
    this.validateConfig()
  }

  private loadConfig(): ConfigOverrides {
    const config: ConfigOverrides = {}

    // Calibration storage
    const file = this.env.PH_CALIBRATION_FILE
    if (file !== undefined && file.trim() !== '') {
      config.CALIBRATION_FILE_PATH = file.trim()
    }
    const makedirs = this.readBoolean('PH_MAKEDIRS')
    if (makedirs !== undefined) config.CALIBRATION_MAKEDIRS = makedirs

    // Readings
    const decimals = this.readNumber('PH_DECIMALS')
    if (decimals !== undefined) config.READING_DECIMALS = decimals
    const coefficient = this.readNumber('PH_TEMP_COEFFICIENT')
    if (coefficient !== undefined) config.TEMP_COMPENSATION_COEFFICIENT = coefficient
    const reference = this.readNumber('PH_REFERENCE_TEMP')
    if (reference !== undefined) config.REFERENCE_TEMPERATURE_C = reference

    // Logging
    const level = this.readLogLevel('PH_LOG_LEVEL')
    if (level !== undefined) {
      config.GLOBAL_LOG_LEVEL = level
      config.CONSOLE_LOG_LEVEL = level
    }

    return config
  }

  private readNumber(name: string): number | undefined {
    const raw = this.env[name]
    if (raw === undefined || raw.trim() === '') return undefined

    const value = Number(raw)
    if (!Number.isFinite(value)) {
      this.errors.push(`${name} must be a number (got '${raw}')`)
      return undefined
    }
    return value
  }

  private readBoolean(name: string): boolean | undefined {
    const raw = this.env[name]
    if (raw === undefined || raw.trim() === '') return undefined

    const value = BOOLEAN_NAMES[raw.trim().toUpperCase()]
    if (value === undefined) {
      this.errors.push(`${name} must be true, false, yes, no, 1 or 0 (got '${raw}')`)
    }
    return value
  }

  private readLogLevel(name: string): LogLevel | undefined {
    const raw = this.env[name]
    if (raw === undefined || raw.trim() === '') return undefined

    const byName = LEVEL_NAMES[raw.trim().toUpperCase()]
    if (byName !== undefined) return byName

    const byNumber = toLogLevel(Number(raw))
    if (byNumber === null) {
      this.errors.push(`${name} must be DEBUG, INFO, WARNING, CRITICAL or 0-3 (got '${raw}')`)
      return undefined
    }
    return byNumber
  }

  private validateConfig(): void {
    if (this.errors.length > 0) {
      throw new Error(`Configuration errors:\n${this.errors.map((error) => `  - ${error}`).join('\n')}`)
    }
  }

  get(): ConfigOverrides {
    return { ...this.config }
  }
}

export { ConfigManager }
