/**
 * Collect current weather for a team member's city
 *
 * Fetches current conditions from OpenWeatherMap, appends them to
 * weather_<member>_<time>.csv in the data directory, then prints the
 * team comparison when other members' data is present and saves it as
 * team_comparison_<time>.txt next to the CSV files.
 *
 * Usage:
 *   npx tsx scripts/collect-weather.ts --name <member> --city <city> [--country <code>] [--dir data]
 *
 * Environment variables:
 *   OPENWEATHER_API_KEY - Required (OPENWEATHER_API_KEY_BACKUP is used as a fallback)
 */

import { DateTime } from 'luxon'
import { getOption } from '@/lib/cli-args'
import { loadConfig, loadEnvFiles, maskApiKey, requireApiKey } from '@/lib/config'
import {
  fetchCurrentWeather,
  formatObservation,
  observationFileName,
  saveObservation,
} from '@/lib/openweather'
import { fatalErrorLine, runTeamReport, writeReportFile } from '@/lib/team-weather'

loadEnvFiles()
const config = loadConfig()

const args = process.argv.slice(2)
const MEMBER_NAME = getOption(args, '--name')?.trim() || 'Team Member'
const CITY = getOption(args, '--city')?.trim()
const COUNTRY = getOption(args, '--country')?.trim() || undefined
const DATA_DIR = getOption(args, '--dir') ?? config.dataDir

async function main() {
  console.log('🌤️  TEAM WEATHER DASHBOARD')
  console.log('='.repeat(50))

  if (!CITY) {
    console.error('❌ City name is required!')
    console.error('   Usage: npx tsx scripts/collect-weather.ts --name <member> --city <city> [--country <code>]')
    process.exit(1)
  }

  const apiKey = requireApiKey(config)
  if (config.debug) {
    console.log(`🔑 Using API key ${maskApiKey(apiKey)}`)
  }

  console.log(`\n🔄 Getting weather data for ${CITY}...`)
  const now = DateTime.now()
  const weather = await fetchCurrentWeather(CITY, COUNTRY, {
    apiKey,
    baseUrl: config.openWeatherBaseUrl,
  })
  const observation = formatObservation(weather, MEMBER_NAME, now)

  console.log(`\n🌡️  Current Weather in ${observation.city}, ${observation.country}:`)
  console.log(`   Temperature: ${observation.temperature.toFixed(1)}°C (feels like ${observation.feels_like.toFixed(1)}°C)`)
  console.log(`   Condition: ${observation.weather_description}`)
  console.log(`   Humidity: ${observation.humidity}%`)
  if (observation.wind_speed !== undefined) {
    console.log(`   Wind: ${observation.wind_speed.toFixed(1)} m/s`)
  }
  console.log(`   Sunrise: ${observation.sunrise} | Sunset: ${observation.sunset}`)

  const csvPath = saveObservation(DATA_DIR, observation, observationFileName(MEMBER_NAME, now))
  console.log(`\n💾 Data saved to: ${csvPath}`)

  console.log('\n📊 Loading team comparison data...')
  const result = runTeamReport({ dataDir: DATA_DIR, now })
  for (const warning of result.load.warnings) {
    console.warn(`   ⚠️  Skipped ${warning.file}: ${warning.message}`)
  }

  if (result.summary.totalRecords > 1) {
    console.log(result.report)

    const saved = writeReportFile(result.report, DATA_DIR, now)
    if (saved.ok) {
      console.log(`\n📋 Comparison report saved to: ${saved.path}`)
    } else {
      console.error(`\n❌ Could not save comparison report to ${saved.path}: ${saved.error}`)
    }
  } else {
    console.log('\n📝 Add more team member data files to generate comparison reports!')
    console.log('   Each team member should run this script and share their CSV file.')
  }

  console.log('\n✅ Weather dashboard complete!')
  console.log(`📁 Check the '${DATA_DIR}' folder for CSV files to share with your team.`)
}

main().catch((error) => {
  console.error(`\n${fatalErrorLine(error)}`)
  process.exit(1)
})
