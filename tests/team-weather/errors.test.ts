import { describe, expect, it } from 'vitest'
import { CsvReadError, errorMessage, fatalErrorLine } from '@/lib/team-weather/errors'

describe('errorMessage', () => {
  it('uses the message of an Error', () => {
    expect(errorMessage(new Error('HTTP 401: Unauthorized'))).toBe('HTTP 401: Unauthorized')
  })

  it('stringifies anything else', () => {
    expect(errorMessage('timed out')).toBe('timed out')
    expect(errorMessage(42)).toBe('42')
  })
})

describe('fatalErrorLine', () => {
  it('prefixes the message the way both scripts print it', () => {
    expect(fatalErrorLine(new Error('Missing required environment variables: OPENWEATHER_API_KEY'))).toBe(
      '❌ Error: Missing required environment variables: OPENWEATHER_API_KEY'
    )
  })

  it('carries the file name of a CsvReadError', () => {
    const error = new CsvReadError('weather_data_Eric.csv', new Error('Invalid Closing Quote'))
    expect(fatalErrorLine(error)).toBe('❌ Error: Failed to load weather_data_Eric.csv: Invalid Closing Quote')
  })
})
