/**
 * Value coercion helpers for the record normalizer
 */

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i

// "(F)", "(°F)", "°F", "fahrenheit", or a trailing "_f" as in "temp_f"
const FAHRENHEIT_MARKER = /\(\s*°?\s*f\s*\)|°\s*f\b|fahrenheit|_f$/i

export function fahrenheitToCelsius(fahrenheit: number): number {
  return (fahrenheit - 32) * 5 / 9
}

/**
 * Parse a plain decimal number. Blank or anything else
 * ("n/a", "12abc", "0x1F") gives undefined, never 0.
 */
export function parseNumeric(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const trimmed = value.trim()
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined
  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : undefined
}

export function hasFahrenheitMarker(header: string): boolean {
  return FAHRENHEIT_MARKER.test(header.trim())
}

export function titleCase(word: string): string {
  if (!word) return word
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}

/** Trimmed string, or undefined when blank */
export function presentString(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}
