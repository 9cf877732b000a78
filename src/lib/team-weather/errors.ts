export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Line a script prints before exiting with status 1 */
export function fatalErrorLine(error: unknown): string {
  return `❌ Error: ${errorMessage(error)}`
}

/**
 * A CSV file could not be opened or parsed at all.
 * Malformed values inside a readable file never raise this.
 */
export class CsvReadError extends Error {
  readonly file: string

  constructor(file: string, cause: unknown) {
    const reason = errorMessage(cause)
    super(`Failed to load ${file}: ${reason}`, { cause })
    this.name = 'CsvReadError'
    this.file = file
  }
}
