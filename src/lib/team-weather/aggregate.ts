import { titleCase } from './conversions'
import type { CanonicalRecord, FieldStats, TeamSummary, TemperatureExtreme } from './types'

/**
 * Min, max and mean over the given values. No values → no-data, not zeros.
 */
export function computeFieldStats(values: readonly number[]): FieldStats {
  if (values.length === 0) {
    return { kind: 'no-data', count: 0 }
  }

  let min = values[0]
  let max = values[0]
  let sum = 0
  for (const value of values) {
    if (value < min) min = value
    if (value > max) max = value
    sum += value
  }

  return { kind: 'range', count: values.length, min, max, mean: sum / values.length }
}

function presentValues(
  records: readonly CanonicalRecord[],
  pick: (record: CanonicalRecord) => number | undefined
): number[] {
  const values: number[] = []
  for (const record of records) {
    const value = pick(record)
    if (value !== undefined) values.push(value)
  }
  return values
}

function distinctSorted(values: Iterable<string | undefined>): string[] {
  const unique = new Set<string>()
  for (const value of values) {
    if (value) unique.add(value)
  }
  return Array.from(unique).sort((a, b) => a.localeCompare(b))
}

// First record in input order that holds the extreme temperature
function findExtreme(
  records: readonly CanonicalRecord[],
  target: number | undefined
): TemperatureExtreme | null {
  if (target === undefined) return null
  const record = records.find(r => r.temperature_celsius === target)
  if (!record) return null
  return { city: record.city, member: record.member_name, value: target }
}

/**
 * Team-wide summary over all canonical records, in file discovery order.
 */
export function summarizeTeam(records: readonly CanonicalRecord[]): TeamSummary {
  const members = distinctSorted(records.map(r => r.member_name))
  const cities = distinctSorted(records.map(r => r.city))

  const temperature = computeFieldStats(presentValues(records, r => r.temperature_celsius))
  const humidity = computeFieldStats(presentValues(records, r => r.humidity_percent))
  const windSpeed = computeFieldStats(presentValues(records, r => r.wind_speed))

  return {
    totalRecords: records.length,
    members,
    memberCount: members.length,
    cities,
    cityCount: cities.length,
    temperature,
    humidity,
    windSpeed,
    weatherConditions: distinctSorted(records.map(r => r.weather_main && titleCase(r.weather_main))),
    countries: distinctSorted(records.map(r => r.country)),
    hottest: findExtreme(records, temperature.kind === 'range' ? temperature.max : undefined),
    coldest: findExtreme(records, temperature.kind === 'range' ? temperature.min : undefined),
  }
}

/**
 * One summary per distinct city, restricted to that city's records.
 * Records without a city are not part of any city summary.
 */
export function summarizeCities(records: readonly CanonicalRecord[]): Record<string, TeamSummary> {
  const byCity = new Map<string, CanonicalRecord[]>()
  for (const record of records) {
    if (!record.city) continue
    const group = byCity.get(record.city)
    if (group) {
      group.push(record)
    } else {
      byCity.set(record.city, [record])
    }
  }

  // Own keys, so "__proto__" is an ordinary city name
  return Object.fromEntries(
    distinctSorted(byCity.keys()).map((city): [string, TeamSummary] => [city, summarizeTeam(byCity.get(city) ?? [])])
  )
}
