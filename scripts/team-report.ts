/**
 * Team weather report
 *
 * Reads every member CSV in the data directory, normalizes the rows,
 * prints the team summary and optionally writes the normalized exports.
 *
 * Usage:
 *   npx tsx scripts/team-report.ts [--dir data] [--export] [--export-dir exports]
 *
 * Options:
 *   --dir DIR          Directory of member CSV files (default: WEATHER_DATA_DIR or "data")
 *   --export           Write team_weather_<time>.csv and team_analysis_<time>.json
 *   --export-dir DIR   Where exports go (default: WEATHER_EXPORT_DIR or "exports")
 */

import { getOption, hasFlag } from '@/lib/cli-args'
import { loadConfig, loadEnvFiles } from '@/lib/config'
import { fatalErrorLine, runTeamReport } from '@/lib/team-weather'

loadEnvFiles()
const config = loadConfig()

const args = process.argv.slice(2)
const DATA_DIR = getOption(args, '--dir') ?? config.dataDir
const EXPORT_DIR = hasFlag(args, '--export')
  ? getOption(args, '--export-dir') ?? config.exportDir
  : undefined

function main() {
  console.log(`📖 Loading team data from ${DATA_DIR}...`)
  const result = runTeamReport({ dataDir: DATA_DIR, exportDir: EXPORT_DIR })

  for (const warning of result.load.warnings) {
    console.warn(`   ⚠️  Skipped ${warning.file}: ${warning.message}`)
  }
  if (config.debug) {
    for (const file of result.load.files) {
      console.log(`   Loaded ${file.rows} rows from ${file.file}`)
    }
  }
  console.log(`📍 ${result.load.records.length} records from ${result.load.files.length} files\n`)

  console.log(result.report)

  if (result.exports) {
    console.log()
    for (const outcome of [result.exports.csv, result.exports.json]) {
      if (outcome.ok) {
        console.log(`💾 Export written: ${outcome.path}`)
      } else {
        console.error(`❌ Export failed for ${outcome.path}: ${outcome.error}`)
      }
    }
  }
}

try {
  main()
} catch (error) {
  console.error(`\n${fatalErrorLine(error)}`)
  process.exit(1)
}
