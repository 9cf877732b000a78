import path from 'path'
import { matchHeaders } from './header-synonyms'
import { memberNameFromFilename } from './member-name'
import {
  fahrenheitToCelsius,
  hasFahrenheitMarker,
  parseNumeric,
  presentString,
  titleCase,
} from './conversions'
import type { CanonicalRecord, RawRow } from './types'

export const UNKNOWN_MEMBER = 'Unknown'
export const UNKNOWN_COUNTRY = 'Unknown'

/**
 * Map one raw CSV row onto a canonical record.
 *
 * Never throws: unmatched headers and unparseable values leave the field
 * absent. Rows without any observation are still returned; dropping them is
 * up to the caller.
 *
 * @param sourceFile File the row came from, used for member inference and provenance
 */
export function normalizeRow(row: RawRow, sourceFile: string): CanonicalRecord {
  const fields = matchHeaders(row)

  const member_name =
    presentString(fields.member_name?.value) ??
    memberNameFromFilename(sourceFile) ??
    UNKNOWN_MEMBER

  let temperature_celsius = parseNumeric(fields.temperature?.value)
  if (temperature_celsius !== undefined && fields.temperature && hasFahrenheitMarker(fields.temperature.header)) {
    temperature_celsius = fahrenheitToCelsius(temperature_celsius)
  }

  let humidity_percent = parseNumeric(fields.humidity?.value)
  if (humidity_percent !== undefined && (humidity_percent < 0 || humidity_percent > 100)) {
    humidity_percent = undefined
  }

  const weather_description = presentString(fields.weather_description?.value)
  const weather_main =
    presentString(fields.weather_main?.value) ?? deriveWeatherMain(weather_description)

  const record: CanonicalRecord = {
    member_name,
    timestamp: presentString(fields.timestamp?.value),
    city: presentString(fields.city?.value),
    country: presentString(fields.country?.value) ?? UNKNOWN_COUNTRY,
    temperature_celsius,
    humidity_percent,
    wind_speed: parseNumeric(fields.wind_speed?.value),
    weather_main,
    weather_description,
    source_file: path.basename(sourceFile),
  }

  return Object.freeze(record)
}

/**
 * Best-effort single-word condition from a free-text description,
 * e.g. "scattered clouds" → "Scattered".
 */
export function deriveWeatherMain(description: string | undefined): string | undefined {
  if (!description) return undefined
  const firstToken = description.split(/\s+/)[0] ?? ''
  const letters = firstToken.replace(/[^\p{L}]/gu, '')
  return letters ? titleCase(letters) : undefined
}
