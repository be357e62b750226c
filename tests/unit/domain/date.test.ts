import { describe, it, expect } from 'vitest'
import {
  checkCalendarDate,
  compareDates,
  daysInMonth,
  formatDate
} from '../../../src/core/domain/date.js'
import { ValidationError } from '../../../src/core/errors/validation-error.js'
import { parseDate } from '../../../src/core/parser/run.js'

describe('checkCalendarDate', () => {
  it('should return a valid date unchanged', () => {
    const date = parseDate('2015-10-20')
    expect(checkCalendarDate(date)).toBe(date)
  })

  it('should accept the 29th of February in a leap year', () => {
    expect(() => checkCalendarDate(parseDate('2016-02-29'))).not.toThrow()
    expect(() => checkCalendarDate(parseDate('2000-02-29'))).not.toThrow()
  })

  it('should reject the 29th of February otherwise', () => {
    expect(() => checkCalendarDate(parseDate('2015-02-29'))).toThrow(
      'Day must be between 01 and 28 in 2015-02-29'
    )
    expect(() => checkCalendarDate(parseDate('1900-02-29'))).toThrow(ValidationError)
  })

  it('should reject month 13', () => {
    let caught: unknown
    try {
      checkCalendarDate(parseDate('2015-13-01'))
    } catch (e) {
      caught = e
    }

    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught).toMatchObject({
      message: 'Month must be between 01 and 12 in 2015-13-01',
      field: 'month',
      value: 13
    })
  })

  it('should reject day zero', () => {
    expect(() => checkCalendarDate(parseDate('2015-10-00'))).toThrow(
      'Day must be between 01 and 31 in 2015-10-00'
    )
  })
})

describe('date helpers', () => {
  it('should know the length of each month', () => {
    expect(daysInMonth(2015, 4)).toBe(30)
    expect(daysInMonth(2015, 12)).toBe(31)
    expect(daysInMonth(2024, 2)).toBe(29)
  })

  it('should reject a month outside the calendar', () => {
    expect(() => daysInMonth(2015, 13)).toThrow(ValidationError)
    expect(() => daysInMonth(2015, 0)).toThrow('Month must be between 01 and 12, got 0')
  })

  it('should order dates', () => {
    const earlier = parseDate('2015-10-23')
    const later = parseDate('2015-10-25')

    expect(compareDates(earlier, later)).toBeLessThan(0)
    expect(compareDates(later, earlier)).toBeGreaterThan(0)
    expect(compareDates(later, parseDate('2015-10-25'))).toBe(0)
    expect(compareDates(parseDate('2014-12-31'), earlier)).toBeLessThan(0)
  })

  it('should format with two-digit month and day', () => {
    expect(formatDate({ year: 2015, month: 3, day: 7 })).toBe('2015-03-07')
  })
})
