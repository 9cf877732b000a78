import { existsSync, readdirSync, readFileSync } from 'fs'
import path from 'path'
import { parse } from 'csv-parse/sync'
import { CsvReadError, errorMessage } from './errors'
import { normalizeRow } from './normalize'
import type { CanonicalRecord, RawRow } from './types'

export interface LoadedFile {
  file: string
  rows: number
}

export interface LoadWarning {
  file: string
  message: string
}

export interface TeamLoadResult {
  records: CanonicalRecord[]
  files: LoadedFile[]
  warnings: LoadWarning[]
}

/**
 * CSV entries in a directory, sorted by name so discovery order is stable.
 * Symlinks are listed without being followed; a broken one fails on read.
 */
export function discoverCsvFiles(dataDir: string): string[] {
  return readdirSync(dataDir, { withFileTypes: true })
    .filter(entry => entry.isFile() || entry.isSymbolicLink())
    .map(entry => entry.name)
    .filter(name => name.toLowerCase().endsWith('.csv'))
    .sort((a, b) => a.localeCompare(b))
    .map(name => path.join(dataDir, name))
}

function toRawRows(parsed: unknown): RawRow[] {
  if (!Array.isArray(parsed)) return []

  const rows: RawRow[] = []
  for (const item of parsed) {
    if (typeof item !== 'object' || item === null) continue
    const row: Record<string, string> = {}
    for (const [header, value] of Object.entries(item)) {
      // Blank header cells carry nothing that can be matched
      if (!header.trim()) continue
      row[header] = value === undefined || value === null ? '' : String(value)
    }
    rows.push(row)
  }
  return rows
}

/**
 * Read one CSV file into raw rows keyed by its own header line.
 * Throws CsvReadError when the file cannot be read or parsed.
 */
export function readCsvRows(filePath: string): RawRow[] {
  let parsed: unknown
  try {
    const csvContent = readFileSync(filePath, 'utf-8')
    parsed = parse(csvContent, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
      relax_column_count: true,
    })
  } catch (error) {
    throw new CsvReadError(path.basename(filePath), error)
  }
  return toRawRows(parsed)
}

/**
 * Load and normalize every CSV file in the team data directory.
 * Files are read one at a time; a file that fails is skipped with a warning.
 */
export function loadTeamRecords(dataDir: string): TeamLoadResult {
  const result: TeamLoadResult = { records: [], files: [], warnings: [] }

  if (!existsSync(dataDir)) {
    result.warnings.push({ file: dataDir, message: `Directory ${dataDir} does not exist` })
    return result
  }

  for (const filePath of discoverCsvFiles(dataDir)) {
    const file = path.basename(filePath)
    try {
      const rows = readCsvRows(filePath)
      for (const row of rows) {
        result.records.push(normalizeRow(row, file))
      }
      result.files.push({ file, rows: rows.length })
    } catch (error) {
      result.warnings.push({
        file,
        message: errorMessage(error),
      })
    }
  }

  return result
}
