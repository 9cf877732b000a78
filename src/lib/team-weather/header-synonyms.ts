import type { CanonicalField, RawRow } from './types'

/**
 * Accepted raw column names per canonical field, in trial order.
 * Adding a new member file format means adding a synonym here.
 * The canonical export column names are listed too so exports re-ingest.
 */
export const HEADER_SYNONYMS: ReadonlyArray<readonly [CanonicalField, readonly string[]]> = [
  ['member_name', ['member_name', 'member', 'team_member', 'member name', 'contributor']],
  ['timestamp', ['timestamp', 'datetime', 'date_time', 'date', 'time', 'observed_at']],
  ['city', ['city', 'location', 'place', 'city_name']],
  ['country', ['country', 'country_code', 'nation']],
  [
    'temperature',
    [
      'temperature',
      'temp',
      'Temperature (F)',
      'Temperature (C)',
      'temperature_celsius',
      'temperature_fahrenheit',
      'temp_c',
      'temp_f',
    ],
  ],
  ['humidity', ['humidity', 'humid', 'humidity_percent', 'Humidity (%)']],
  ['wind_speed', ['wind_speed', 'wind', 'windspeed', 'Wind Speed']],
  ['weather_main', ['weather_main', 'main', 'condition', 'conditions', 'weather']],
  ['weather_description', ['weather_description', 'description', 'details', 'summary']],
]

export interface MatchedField {
  /** Header as it appears in the row */
  header: string
  value: string
}

/**
 * Resolve every canonical field against one row's headers.
 * Matching is case-insensitive on trimmed names; the first synonym present wins.
 */
export function matchHeaders(row: RawRow): Partial<Record<CanonicalField, MatchedField>> {
  const byLowerName = new Map<string, string>()
  for (const header of Object.keys(row)) {
    const key = header.trim().toLowerCase()
    if (!byLowerName.has(key)) {
      byLowerName.set(key, header)
    }
  }

  const matched: Partial<Record<CanonicalField, MatchedField>> = {}
  for (const [field, synonyms] of HEADER_SYNONYMS) {
    for (const synonym of synonyms) {
      const header = byLowerName.get(synonym.toLowerCase())
      if (header !== undefined) {
        matched[field] = { header, value: row[header] ?? '' }
        break
      }
    }
  }
  return matched
}
