import { config as loadDotenv } from 'dotenv'
import path from 'path'

/**
 * Environment configuration for the dashboard scripts
 */

export interface DashboardConfig {
  openWeatherApiKey?: string
  openWeatherBaseUrl: string
  dataDir: string
  exportDir: string
  debug: boolean
}

type Env = Record<string, string | undefined>

export const DEFAULT_OPENWEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5'

export class ConfigError extends Error {
  readonly missing: string[]

  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`)
    this.name = 'ConfigError'
    this.missing = missing
  }
}

/**
 * Load .env.local, then .env, from the working directory.
 * Variables already set in the environment win.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.join(cwd, '.env.local') })
  loadDotenv({ path: path.join(cwd, '.env') })
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export function readBoolean(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === '') return fallback
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase())
}

export function loadConfig(env: Env = process.env): DashboardConfig {
  return {
    openWeatherApiKey: readString(env, 'OPENWEATHER_API_KEY') ?? readString(env, 'OPENWEATHER_API_KEY_BACKUP'),
    openWeatherBaseUrl: readString(env, 'OPENWEATHER_BASE_URL') ?? DEFAULT_OPENWEATHER_BASE_URL,
    dataDir: readString(env, 'WEATHER_DATA_DIR') ?? 'data',
    exportDir: readString(env, 'WEATHER_EXPORT_DIR') ?? 'exports',
    debug: readBoolean(env.DEBUG),
  }
}

export function requireApiKey(config: DashboardConfig): string {
  if (!config.openWeatherApiKey) {
    throw new ConfigError(['OPENWEATHER_API_KEY'])
  }
  return config.openWeatherApiKey
}

/**
 * Keep only the first and last 4 characters for log output
 */
export function maskApiKey(key: string): string {
  if (key.length <= 8) return '*'.repeat(key.length)
  return `${key.slice(0, 4)}${'*'.repeat(key.length - 8)}${key.slice(-4)}`
}
