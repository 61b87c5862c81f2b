import { describe, it, expect } from 'vitest'
import {
  isValidDate,
  parseDateTime,
  parseDateTimeText,
  formatDateTime,
  normalizeDateTime,
} from '../../../src/core/normalizers/date'

describe('isValidDate', () => {
  it('should accept leap days only in leap years', () => {
    expect(isValidDate(2024, 2, 29)).toBe(true)
    expect(isValidDate(2023, 2, 29)).toBe(false)
    expect(isValidDate(2000, 2, 29)).toBe(true)
    expect(isValidDate(1900, 2, 29)).toBe(false)
  })

  it('should reject out of range months and days', () => {
    expect(isValidDate(2024, 13, 1)).toBe(false)
    expect(isValidDate(2024, 0, 1)).toBe(false)
    expect(isValidDate(2024, 4, 31)).toBe(false)
    expect(isValidDate(2024, 1, 0)).toBe(false)
  })
})

describe('parseDateTimeText', () => {
  it('should parse ISO 8601 date-times in UTC', () => {
    expect(parseDateTimeText('2024-01-30T10:15:00Z')).toEqual({
      year: 2024,
      month: 1,
      day: 30,
      hour: 10,
      minute: 15,
      second: 0,
    })
  })

  it('should convert offsets to UTC', () => {
    expect(normalizeDateTime('2024-01-30T10:15:00+02:00')).toBe('30/01/2024 08:15:00')
    expect(normalizeDateTime('2024-01-30T23:30:00-05:00')).toBe('31/01/2024 04:30:00')
  })

  it('should accept fractional seconds and a space separator', () => {
    expect(normalizeDateTime('2024-01-30T10:15:00.123Z')).toBe('30/01/2024 10:15:00')
    expect(normalizeDateTime('2024-01-30 14:03')).toBe('30/01/2024 14:03:00')
  })

  it('should read bare dates as midnight', () => {
    expect(normalizeDateTime('2024-01-30')).toBe('30/01/2024 00:00:00')
  })

  it('should resolve ambiguous slash dates with dayFirst', () => {
    expect(normalizeDateTime('05/03/2024')).toBe('05/03/2024 00:00:00')
    expect(normalizeDateTime('05/03/2024', { dayFirst: false })).toBe('03/05/2024 00:00:00')
  })

  it('should auto-detect the day when one part exceeds 12', () => {
    expect(normalizeDateTime('13/01/2024', { dayFirst: false })).toBe('13/01/2024 00:00:00')
    expect(normalizeDateTime('01/13/2024')).toBe('13/01/2024 00:00:00')
  })

  it('should read dotted dates as day first', () => {
    expect(normalizeDateTime('30.01.2024')).toBe('30/01/2024 00:00:00')
  })

  it('should expand two-digit years', () => {
    expect(normalizeDateTime('1/2/24')).toBe('01/02/2024 00:00:00')
  })

  it('should parse month-name dates', () => {
    expect(normalizeDateTime('January 30, 2024')).toBe('30/01/2024 00:00:00')
    expect(normalizeDateTime('30 Jan 2024')).toBe('30/01/2024 00:00:00')
    expect(normalizeDateTime('Tue, 30 Jan 2024 10:00:00 GMT')).toBe('30/01/2024 10:00:00')
  })

  it('should apply AM/PM', () => {
    expect(normalizeDateTime('Jan 30, 2024 3:45 PM')).toBe('30/01/2024 15:45:00')
    expect(normalizeDateTime('Jan 30, 2024 12:05 AM')).toBe('30/01/2024 00:05:00')
    expect(normalizeDateTime('Jan 30, 2024 13:00 PM')).toBeNull()
  })

  it('should parse compact timestamps', () => {
    expect(normalizeDateTime('20240130T101500')).toBe('30/01/2024 10:15:00')
  })

  it('should reject impossible and non-date text', () => {
    expect(parseDateTimeText('31/02/2024')).toBeNull()
    expect(parseDateTimeText('soon')).toBeNull()
    expect(parseDateTimeText('12:30')).toBeNull()
    expect(parseDateTimeText('20240130')).toBeNull()
    expect(parseDateTimeText('   ')).toBeNull()
  })
})

describe('parseDateTime', () => {
  it('should read numbers as epoch seconds', () => {
    expect(normalizeDateTime(0)).toBe('01/01/1970 00:00:00')
    expect(normalizeDateTime(1706609700)).toBe('30/01/2024 10:15:00')
  })

  it('should read numbers above 1e12 as epoch milliseconds', () => {
    expect(normalizeDateTime(1706609700000)).toBe('30/01/2024 10:15:00')
  })

  it('should reject booleans and null', () => {
    expect(parseDateTime(true)).toBeNull()
    expect(parseDateTime(null)).toBeNull()
  })
})

describe('formatDateTime', () => {
  it('should zero-pad every component', () => {
    expect(
      formatDateTime({ year: 2024, month: 1, day: 3, hour: 9, minute: 5, second: 7 })
    ).toBe('03/01/2024 09:05:07')
  })

  it('should produce output that parses back to the same instant', () => {
    const inputs = [
      '2024-01-30T10:15:00+02:00',
      'Jan 30, 2024 3:45 PM',
      '01/13/2024',
      '2023-12-31T23:59:59Z',
    ]
    for (const input of inputs) {
      const formatted = normalizeDateTime(input)
      expect(formatted).toMatch(/^\d{2}\/\d{2}\/\d{4} \d{2}:\d{2}:\d{2}$/)
      expect(normalizeDateTime(formatted ?? '')).toBe(formatted)
    }
  })
})
