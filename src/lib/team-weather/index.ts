export * from './types'
export { HEADER_SYNONYMS, matchHeaders } from './header-synonyms'
export { fahrenheitToCelsius, hasFahrenheitMarker, parseNumeric, titleCase } from './conversions'
export { memberNameFromFilename } from './member-name'
export { normalizeRow, deriveWeatherMain, UNKNOWN_MEMBER, UNKNOWN_COUNTRY } from './normalize'
export { computeFieldStats, summarizeTeam, summarizeCities } from './aggregate'
export {
  CANONICAL_COLUMNS,
  buildExportCsv,
  buildExportDocument,
  writeExports,
  writeReportFile,
  type ExportDocument,
  type ExportOutcome,
  type ExportResult,
} from './export'
export { CsvReadError, errorMessage, fatalErrorLine } from './errors'
export { discoverCsvFiles, readCsvRows, loadTeamRecords, type TeamLoadResult } from './load'
export { formatReport } from './report'
export { runTeamReport, type TeamReportOptions, type TeamReportResult } from './run-report'
