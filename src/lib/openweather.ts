/**
 * OpenWeatherMap current-weather collector
 *
 * Fetches the current conditions for a member's city and appends them to the
 * member's CSV file in the team data directory. The rows it writes are read
 * back by the team report like any other member file.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs'
import path from 'path'
import { stringify } from 'csv-stringify/sync'
import { DateTime, FixedOffsetZone } from 'luxon'
import { DEFAULT_OPENWEATHER_BASE_URL } from './config'

const MAX_RETRIES = 3
const RETRY_DELAY_MS = 2000

export interface OpenWeatherCurrentResponse {
  name: string
  timezone: number
  visibility?: number
  sys: { country: string; sunrise: number; sunset: number }
  main: { temp: number; feels_like: number; humidity: number; pressure: number }
  weather: { main: string; description: string }[]
  wind?: { speed?: number; deg?: number }
  clouds?: { all?: number }
}

/** One collected observation, in CSV column order */
export interface ObservationRow {
  timestamp: string
  member_name: string
  city: string
  country: string
  temperature: number
  feels_like: number
  humidity: number
  pressure: number
  weather_main: string
  weather_description: string
  wind_speed?: number
  wind_direction?: number
  cloudiness?: number
  visibility?: number
  sunrise: string
  sunset: string
  timezone: number
}

export const OBSERVATION_COLUMNS = [
  'timestamp',
  'member_name',
  'city',
  'country',
  'temperature',
  'feels_like',
  'humidity',
  'pressure',
  'weather_main',
  'weather_description',
  'wind_speed',
  'wind_direction',
  'cloudiness',
  'visibility',
  'sunrise',
  'sunset',
  'timezone',
] as const satisfies ReadonlyArray<keyof ObservationRow>

export interface FetchOptions {
  retries?: number
  retryDelayMs?: number
}

export interface CurrentWeatherOptions extends FetchOptions {
  apiKey: string
  baseUrl?: string
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * fetch() with retries on network errors, 429 and 5xx.
 * Other non-OK statuses fail straight away.
 */
export async function fetchWithRetry(url: string, options: FetchOptions = {}): Promise<Response> {
  const retries = options.retries ?? MAX_RETRIES
  const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS
  let lastError: unknown = new Error('Max retries exceeded')

  for (let attempt = 1; attempt <= retries; attempt++) {
    let response: Response | null = null
    try {
      response = await fetch(url)
    } catch (error) {
      lastError = error
    }

    if (response) {
      if (response.ok) {
        return response
      }
      const httpError = new Error(`HTTP ${response.status}: ${response.statusText}`)
      if (response.status !== 429 && response.status < 500) {
        throw httpError
      }
      lastError = httpError
    }

    if (attempt < retries) {
      await sleep(retryDelayMs * attempt)
    }
  }

  throw lastError
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isCurrentWeatherResponse(value: unknown): value is OpenWeatherCurrentResponse {
  if (!isRecord(value)) return false
  const { name, timezone, sys, main, weather } = value
  return (
    typeof name === 'string' &&
    typeof timezone === 'number' &&
    isRecord(sys) &&
    typeof sys.country === 'string' &&
    typeof sys.sunrise === 'number' &&
    typeof sys.sunset === 'number' &&
    isRecord(main) &&
    typeof main.temp === 'number' &&
    typeof main.feels_like === 'number' &&
    typeof main.humidity === 'number' &&
    typeof main.pressure === 'number' &&
    Array.isArray(weather) &&
    weather.length > 0 &&
    isRecord(weather[0]) &&
    typeof weather[0].main === 'string' &&
    typeof weather[0].description === 'string'
  )
}

export function buildCurrentWeatherUrl(city: string, countryCode: string | undefined, options: CurrentWeatherOptions): string {
  const location = countryCode ? `${city},${countryCode}` : city
  const url = new URL(`${options.baseUrl ?? DEFAULT_OPENWEATHER_BASE_URL}/weather`)
  url.searchParams.set('q', location)
  url.searchParams.set('appid', options.apiKey)
  url.searchParams.set('units', 'metric')
  return url.toString()
}

/**
 * Current conditions for a city, in metric units
 */
export async function fetchCurrentWeather(
  city: string,
  countryCode: string | undefined,
  options: CurrentWeatherOptions
): Promise<OpenWeatherCurrentResponse> {
  const response = await fetchWithRetry(buildCurrentWeatherUrl(city, countryCode, options), options)
  const data: unknown = await response.json()
  if (!isCurrentWeatherResponse(data)) {
    throw new Error(`Unexpected weather response for ${city}`)
  }
  return data
}

function localClock(epochSeconds: number, utcOffsetSeconds: number): string {
  return DateTime.fromSeconds(epochSeconds, {
    zone: FixedOffsetZone.instance(utcOffsetSeconds / 60),
  }).toFormat('HH:mm')
}

export function formatObservation(
  data: OpenWeatherCurrentResponse,
  memberName: string,
  now: DateTime = DateTime.now()
): ObservationRow {
  const condition = data.weather[0]
  return {
    timestamp: now.toJSDate().toISOString(),
    member_name: memberName,
    city: data.name,
    country: data.sys.country,
    temperature: data.main.temp,
    feels_like: data.main.feels_like,
    humidity: data.main.humidity,
    pressure: data.main.pressure,
    weather_main: condition.main,
    weather_description: condition.description,
    wind_speed: data.wind?.speed,
    wind_direction: data.wind?.deg,
    cloudiness: data.clouds?.all,
    visibility: data.visibility === undefined ? undefined : data.visibility / 1000,
    sunrise: localClock(data.sys.sunrise, data.timezone),
    sunset: localClock(data.sys.sunset, data.timezone),
    timezone: data.timezone / 3600,
  }
}

/** weather_<member>_<yyyyLLdd_HHmmss>.csv */
export function observationFileName(memberName: string, now: DateTime = DateTime.now()): string {
  const member = memberName.trim().replace(/\s+/g, '_').toLowerCase()
  return `weather_${member}_${now.toFormat('yyyyLLdd_HHmmss')}.csv`
}

/**
 * Append one observation; the header is written only when the file is new.
 * @returns Path of the CSV file
 */
export function saveObservation(dataDir: string, row: ObservationRow, fileName: string): string {
  mkdirSync(dataDir, { recursive: true })
  const csvPath = path.join(dataDir, fileName)
  const csvOutput = stringify([row], {
    header: !existsSync(csvPath),
    columns: [...OBSERVATION_COLUMNS],
  })
  appendFileSync(csvPath, csvOutput, 'utf-8')
  return csvPath
}
