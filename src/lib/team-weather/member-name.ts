import path from 'path'

// weather_data_<Name>.csv
const DATA_FILE_PATTERN = /^weather_data_(.+)\.csv$/i
// weather_<name>_<YYYYMMDD>[_<HHMMSS>].csv, as written by the collect script
const COLLECTED_FILE_PATTERN = /^weather_(.+?)_(\d{8})(?:_(\d{6}))?\.csv$/i

/**
 * Infer the contributing member from a CSV file name.
 *
 * Recognized names:
 * - `weather_data_Eric.csv` → `Eric`
 * - `weather_eric_smith_20250101_093000.csv` → `eric smith`
 *
 * Underscores inside the name become spaces; casing is kept.
 * Returns undefined for anything else.
 */
export function memberNameFromFilename(fileName: string): string | undefined {
  const base = path.basename(fileName)

  const dataMatch = base.match(DATA_FILE_PATTERN)
  if (dataMatch) {
    return cleanName(dataMatch[1])
  }

  const collectedMatch = base.match(COLLECTED_FILE_PATTERN)
  if (collectedMatch) {
    return cleanName(collectedMatch[1])
  }

  return undefined
}

function cleanName(segment: string): string | undefined {
  const name = segment.replace(/_+/g, ' ').trim()
  return name || undefined
}
