import type { CanonicalRecord } from '@/lib/team-weather/types'

export function record(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    member_name: 'Eric',
    country: 'Unknown',
    source_file: 'weather_data_Eric.csv',
    ...overrides,
  }
}

export const parisEric = record({
  city: 'Paris',
  country: 'FR',
  temperature_celsius: 20,
  humidity_percent: 40,
  wind_speed: 3,
  weather_main: 'clouds',
})

export const londonMaya = record({
  member_name: 'Maya',
  source_file: 'weather_data_Maya.csv',
  city: 'London',
  country: 'GB',
  temperature_celsius: 30,
  weather_main: 'Clouds',
})

export const nowhereEric = record({
  humidity_percent: 60,
  weather_main: 'Rain',
})
