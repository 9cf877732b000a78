import { describe, expect, it } from 'vitest'
import { getOption, hasFlag } from '@/lib/cli-args'

describe('cli args', () => {
  const args = ['--city', 'Paris', '--export', '--name']

  it('finds flags', () => {
    expect(hasFlag(args, '--export')).toBe(true)
    expect(hasFlag(args, '--dir')).toBe(false)
  })

  it('reads option values', () => {
    expect(getOption(args, '--city')).toBe('Paris')
    expect(getOption(args, '--dir')).toBeUndefined()
  })

  it('ignores an option without a value', () => {
    expect(getOption(args, '--name')).toBeUndefined()
    expect(getOption(['--dir', '--export'], '--dir')).toBeUndefined()
  })
})
