/**
 * Minimal flag parsing for the scripts, e.g. `--city Paris --export`
 */

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.includes(flag)
}

/** Value following `flag`, or undefined when missing or followed by another flag */
export function getOption(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag)
  if (index === -1) return undefined
  const value = args[index + 1]
  if (value === undefined || value.startsWith('--')) return undefined
  return value
}
