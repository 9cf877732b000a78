import { DateTime } from 'luxon'
import type { FieldStats, TeamSummary } from './types'

const NO_DATA = 'no data'

function listOrNone(values: string[]): string {
  return values.length > 0 ? values.join(', ') : 'none'
}

function temperatureLines(summary: TeamSummary): string[] {
  const stats = summary.temperature
  if (stats.kind === 'no-data') {
    return [`   • ${NO_DATA}`]
  }
  return [
    `   • Hottest: ${stats.max.toFixed(1)}°C in ${summary.hottest?.city ?? 'N/A'}`,
    `   • Coldest: ${stats.min.toFixed(1)}°C in ${summary.coldest?.city ?? 'N/A'}`,
    `   • Team Average: ${stats.mean.toFixed(1)}°C`,
    `   • Temperature Range: ${(stats.max - stats.min).toFixed(1)}°C`,
  ]
}

function humidityLines(stats: FieldStats): string[] {
  if (stats.kind === 'no-data') {
    return [`   • ${NO_DATA}`]
  }
  return [
    `   • Highest: ${stats.max.toFixed(0)}%`,
    `   • Lowest: ${stats.min.toFixed(0)}%`,
    `   • Team Average: ${stats.mean.toFixed(1)}%`,
  ]
}

function windLines(stats: FieldStats): string[] {
  if (stats.kind === 'no-data') {
    return [`   • ${NO_DATA}`]
  }
  return [
    `   • Strongest: ${stats.max.toFixed(1)} m/s`,
    `   • Calmest: ${stats.min.toFixed(1)} m/s`,
    `   • Team Average: ${stats.mean.toFixed(1)} m/s`,
  ]
}

/**
 * Fixed-layout text report printed after every run
 */
export function formatReport(summary: TeamSummary, generatedAt: DateTime = DateTime.now()): string {
  const lines = [
    '🌤️  TEAM WEATHER DASHBOARD REPORT',
    '='.repeat(39),
    '📊 Overview:',
    `   • Team Members: ${summary.memberCount}`,
    `   • Cities Covered: ${summary.cityCount}`,
    `   • Records: ${summary.totalRecords}`,
    `   • Countries: ${listOrNone(summary.countries)}`,
    '',
    '🌡️  Temperature Analysis:',
    ...temperatureLines(summary),
    '',
    '💧 Humidity Analysis:',
    ...humidityLines(summary.humidity),
    '',
    '💨 Wind Analysis:',
    ...windLines(summary.windSpeed),
    '',
    '☁️  Weather Conditions Across Team:',
    `   • ${listOrNone(summary.weatherConditions)}`,
    '',
    `Report generated: ${generatedAt.toFormat('yyyy-LL-dd HH:mm:ss')}`,
  ]
  return lines.join('\n')
}
