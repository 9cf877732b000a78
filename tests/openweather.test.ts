import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import path from 'path'
import { DateTime } from 'luxon'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  buildCurrentWeatherUrl,
  fetchCurrentWeather,
  fetchWithRetry,
  formatObservation,
  observationFileName,
  saveObservation,
  type OpenWeatherCurrentResponse,
} from '@/lib/openweather'
import { memberNameFromFilename } from '@/lib/team-weather/member-name'
import { loadTeamRecords } from '@/lib/team-weather/load'

const paris: OpenWeatherCurrentResponse = {
  name: 'Paris',
  timezone: 3600,
  visibility: 10000,
  sys: { country: 'FR', sunrise: 1700000000, sunset: 1700030000 },
  main: { temp: 12.3, feels_like: 11.1, humidity: 80, pressure: 1012 },
  weather: [{ main: 'Clouds', description: 'broken clouds' }],
  wind: { speed: 4.1, deg: 250 },
  clouds: { all: 75 },
}

const now = DateTime.fromISO('2025-03-04T05:06:07Z')

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), { status, statusText })
}

describe('formatObservation', () => {
  it('flattens the API response into one CSV row', () => {
    expect(formatObservation(paris, 'Eric Smith', now)).toEqual({
      timestamp: '2025-03-04T05:06:07.000Z',
      member_name: 'Eric Smith',
      city: 'Paris',
      country: 'FR',
      temperature: 12.3,
      feels_like: 11.1,
      humidity: 80,
      pressure: 1012,
      weather_main: 'Clouds',
      weather_description: 'broken clouds',
      wind_speed: 4.1,
      wind_direction: 250,
      cloudiness: 75,
      visibility: 10,
      sunrise: '23:13',
      sunset: '07:33',
      timezone: 1,
    })
  })

  it('leaves missing wind and visibility empty rather than zero', () => {
    const row = formatObservation({ ...paris, wind: undefined, visibility: undefined }, 'Eric', now)
    expect(row.wind_speed).toBeUndefined()
    expect(row.wind_direction).toBeUndefined()
    expect(row.visibility).toBeUndefined()
  })
})

describe('observation files', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'team-weather-collect-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('names files so the member can be read back', () => {
    const fileName = observationFileName(' Eric  Smith ', DateTime.fromObject({ year: 2025, month: 3, day: 4, hour: 5, minute: 6, second: 7 }))
    expect(fileName).toBe('weather_eric_smith_20250304_050607.csv')
    expect(memberNameFromFilename(fileName)).toBe('eric smith')
  })

  it('writes the header once and appends rows', () => {
    const row = formatObservation(paris, 'Eric Smith', now)
    const csvPath = saveObservation(dir, row, 'weather_eric_smith_20250304_050607.csv')
    saveObservation(dir, row, 'weather_eric_smith_20250304_050607.csv')

    const lines = readFileSync(csvPath, 'utf-8').trimEnd().split('\n')
    expect(lines).toHaveLength(3)
    expect(lines[0]).toBe(
      'timestamp,member_name,city,country,temperature,feels_like,humidity,pressure,weather_main,weather_description,wind_speed,wind_direction,cloudiness,visibility,sunrise,sunset,timezone'
    )
    expect(lines[1]).toBe(
      '2025-03-04T05:06:07.000Z,Eric Smith,Paris,FR,12.3,11.1,80,1012,Clouds,broken clouds,4.1,250,75,10,23:13,07:33,1'
    )
  })

  it('produces rows the team loader normalizes', () => {
    saveObservation(dir, formatObservation(paris, 'Eric Smith', now), 'weather_eric_smith_20250304_050607.csv')

    const { records } = loadTeamRecords(dir)
    expect(records).toEqual([
      {
        member_name: 'Eric Smith',
        timestamp: '2025-03-04T05:06:07.000Z',
        city: 'Paris',
        country: 'FR',
        temperature_celsius: 12.3,
        humidity_percent: 80,
        wind_speed: 4.1,
        weather_main: 'Clouds',
        weather_description: 'broken clouds',
        source_file: 'weather_eric_smith_20250304_050607.csv',
      },
    ])
  })
})

describe('fetching current weather', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('builds a metric query for city and country', () => {
    const url = new URL(buildCurrentWeatherUrl('Paris', 'FR', { apiKey: 'test-key', baseUrl: 'http://weather.test/data/2.5' }))
    expect(url.origin + url.pathname).toBe('http://weather.test/data/2.5/weather')
    expect(url.searchParams.get('q')).toBe('Paris,FR')
    expect(url.searchParams.get('appid')).toBe('test-key')
    expect(url.searchParams.get('units')).toBe('metric')
  })

  it('returns the parsed response', async () => {
    const fetchMock = vi.fn(async () => jsonResponse(paris))
    vi.stubGlobal('fetch', fetchMock)

    await expect(fetchCurrentWeather('Paris', undefined, { apiKey: 'test-key' })).resolves.toEqual(paris)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('rejects a payload without the expected fields', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ cod: 200, name: 'Paris' })))

    await expect(fetchCurrentWeather('Paris', 'FR', { apiKey: 'test-key' })).rejects.toThrow(
      'Unexpected weather response for Paris'
    )
  })

  it('retries server errors', async () => {
    const fetchMock = vi
      .fn<() => Promise<Response>>()
      .mockResolvedValueOnce(jsonResponse({}, 503, 'Service Unavailable'))
      .mockResolvedValueOnce(jsonResponse(paris))
    vi.stubGlobal('fetch', fetchMock)

    const response = await fetchWithRetry('http://weather.test/weather', { retries: 3, retryDelayMs: 0 })
    expect(response.status).toBe(200)
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('fails fast on client errors', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ message: 'city not found' }, 404, 'Not Found'))
    vi.stubGlobal('fetch', fetchMock)

    await expect(fetchWithRetry('http://weather.test/weather', { retries: 3, retryDelayMs: 0 })).rejects.toThrow(
      'HTTP 404: Not Found'
    )
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('gives up after the last network error', async () => {
    const fetchMock = vi.fn(async (): Promise<Response> => {
      throw new Error('connect ECONNREFUSED')
    })
    vi.stubGlobal('fetch', fetchMock)

    await expect(fetchWithRetry('http://weather.test/weather', { retries: 2, retryDelayMs: 0 })).rejects.toThrow(
      'connect ECONNREFUSED'
    )
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })
})
