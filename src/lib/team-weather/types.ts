/**
 * Canonical team weather data structures
 */

/**
 * One CSV line keyed by its header, exactly as it was read.
 * Header names are whatever the contributing member's file used.
 */
export type RawRow = Readonly<Record<string, string>>

/**
 * Normalized weather observation.
 * Property names match the canonical CSV export columns.
 */
export interface CanonicalRecord {
  readonly member_name: string
  readonly timestamp?: string
  readonly city?: string
  readonly country: string
  readonly temperature_celsius?: number
  readonly humidity_percent?: number
  readonly wind_speed?: number
  readonly weather_main?: string
  readonly weather_description?: string
  /** Base name of the file the record was read from */
  readonly source_file: string
}

/** Canonical fields that are looked up through the header synonym table */
export type CanonicalField =
  | 'member_name'
  | 'timestamp'
  | 'city'
  | 'country'
  | 'temperature'
  | 'humidity'
  | 'wind_speed'
  | 'weather_main'
  | 'weather_description'

/** Statistics of one numeric column, over present values only */
export type FieldStats =
  | { kind: 'no-data'; count: 0 }
  | { kind: 'range'; count: number; min: number; max: number; mean: number }

export interface TemperatureExtreme {
  city?: string
  member: string
  value: number
}

export interface TeamSummary {
  totalRecords: number
  members: string[]
  memberCount: number
  cities: string[]
  cityCount: number
  temperature: FieldStats
  humidity: FieldStats
  windSpeed: FieldStats
  weatherConditions: string[]
  countries: string[]
  hottest: TemperatureExtreme | null
  coldest: TemperatureExtreme | null
}
