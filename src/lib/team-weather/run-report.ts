import { DateTime } from 'luxon'
import { summarizeTeam } from './aggregate'
import { writeExports, type ExportResult } from './export'
import { loadTeamRecords, type TeamLoadResult } from './load'
import { formatReport } from './report'
import type { TeamSummary } from './types'

export interface TeamReportOptions {
  dataDir: string
  /** Write CSV/JSON exports here; no exports when omitted */
  exportDir?: string
  now?: DateTime
}

export interface TeamReportResult {
  load: TeamLoadResult
  summary: TeamSummary
  report: string
  exports?: ExportResult
}

/**
 * Load → summarize → format, plus optional exports.
 * Export failures are part of the result; the summary is always produced.
 */
export function runTeamReport(options: TeamReportOptions): TeamReportResult {
  const now = options.now ?? DateTime.now()
  const load = loadTeamRecords(options.dataDir)
  const summary = summarizeTeam(load.records)
  const report = formatReport(summary, now)

  const result: TeamReportResult = { load, summary, report }
  if (options.exportDir) {
    result.exports = writeExports(load.records, options.exportDir, now)
  }
  return result
}
