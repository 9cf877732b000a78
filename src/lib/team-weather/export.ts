import { mkdirSync, writeFileSync } from 'fs'
import path from 'path'
import { stringify } from 'csv-stringify/sync'
import { DateTime } from 'luxon'
import { summarizeCities, summarizeTeam } from './aggregate'
import { errorMessage } from './errors'
import type { CanonicalRecord, FieldStats, TeamSummary, TemperatureExtreme } from './types'

/** Column order of the normalized CSV export */
export const CANONICAL_COLUMNS = [
  'member_name',
  'timestamp',
  'city',
  'country',
  'temperature_celsius',
  'humidity_percent',
  'wind_speed',
  'weather_main',
  'weather_description',
  'source_file',
] as const satisfies ReadonlyArray<keyof CanonicalRecord>

export type ExportedStats =
  | { count: 0; no_data: true }
  | { count: number; lowest: number; highest: number; average: number }

export interface ExportedSummary {
  total_records: number
  total_members: number
  members: string[]
  total_cities: number
  cities: string[]
  temperature_stats: ExportedStats
  humidity_stats: ExportedStats
  wind_stats: ExportedStats
  weather_conditions: string[]
  countries: string[]
  hottest: TemperatureExtreme | null
  coldest: TemperatureExtreme | null
}

/** Document consumed by the "Compare Cities" view */
export interface ExportDocument {
  team_summary: ExportedSummary
  cities_analysis: Record<string, ExportedSummary>
}

export type ExportOutcome =
  | { ok: true; path: string }
  | { ok: false; path: string; error: string }

export interface ExportResult {
  csv: ExportOutcome
  json: ExportOutcome
}

export function buildExportCsv(records: readonly CanonicalRecord[]): string {
  return stringify(
    records.map(record => ({ ...record })),
    { header: true, columns: [...CANONICAL_COLUMNS] }
  )
}

function toExportedStats(stats: FieldStats): ExportedStats {
  if (stats.kind === 'no-data') {
    return { count: 0, no_data: true }
  }
  return { count: stats.count, lowest: stats.min, highest: stats.max, average: stats.mean }
}

function toExportedSummary(summary: TeamSummary): ExportedSummary {
  return {
    total_records: summary.totalRecords,
    total_members: summary.memberCount,
    members: summary.members,
    total_cities: summary.cityCount,
    cities: summary.cities,
    temperature_stats: toExportedStats(summary.temperature),
    humidity_stats: toExportedStats(summary.humidity),
    wind_stats: toExportedStats(summary.windSpeed),
    weather_conditions: summary.weatherConditions,
    countries: summary.countries,
    hottest: summary.hottest,
    coldest: summary.coldest,
  }
}

export function buildExportDocument(records: readonly CanonicalRecord[]): ExportDocument {
  const cities = Object.entries(summarizeCities(records))

  return {
    team_summary: toExportedSummary(summarizeTeam(records)),
    cities_analysis: Object.fromEntries(
      cities.map(([city, summary]): [string, ExportedSummary] => [city, toExportedSummary(summary)])
    ),
  }
}

function writeFresh(filePath: string, content: () => string): ExportOutcome {
  try {
    // wx: never overwrite an export from an earlier run
    writeFileSync(filePath, content(), { encoding: 'utf-8', flag: 'wx' })
    return { ok: true, path: filePath }
  } catch (error) {
    return {
      ok: false,
      path: filePath,
      error: errorMessage(error),
    }
  }
}

/**
 * Write the normalized CSV and the JSON analysis into exportDir.
 * Best-effort: failures are returned per file and never thrown.
 */
export function writeExports(
  records: readonly CanonicalRecord[],
  exportDir: string,
  now: DateTime = DateTime.now()
): ExportResult {
  const stamp = now.toFormat('yyyyLLdd_HHmmss')
  const csvPath = path.join(exportDir, `team_weather_${stamp}.csv`)
  const jsonPath = path.join(exportDir, `team_analysis_${stamp}.json`)

  try {
    mkdirSync(exportDir, { recursive: true })
  } catch (error) {
    const message = errorMessage(error)
    return {
      csv: { ok: false, path: csvPath, error: message },
      json: { ok: false, path: jsonPath, error: message },
    }
  }

  return {
    csv: writeFresh(csvPath, () => buildExportCsv(records)),
    json: writeFresh(jsonPath, () => JSON.stringify(buildExportDocument(records), null, 2)),
  }
}

/**
 * Save the printed comparison report beside the member files as
 * team_comparison_<time>.txt. Best-effort like writeExports.
 */
export function writeReportFile(
  report: string,
  dataDir: string,
  now: DateTime = DateTime.now()
): ExportOutcome {
  const reportPath = path.join(dataDir, `team_comparison_${now.toFormat('yyyyLLdd_HHmmss')}.txt`)
  return writeFresh(reportPath, () => report)
}
