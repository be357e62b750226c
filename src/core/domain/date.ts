import { ValidationError } from '../errors/validation-error.js'

/**
 * A journal date as written. Month and day are not range-checked by the
 * grammar; use {@link checkCalendarDate} when that matters.
 */
export interface LedgerDate {
  readonly year: number
  readonly month: number
  readonly day: number
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

/**
 * @throws {ValidationError} when `month` is not 1 to 12
 */
export function daysInMonth(year: number, month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError(`Month must be between 01 and 12, got ${month}`, 'month', month)
  }
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month - 1]
}

export function compareDates(a: LedgerDate, b: LedgerDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day
}

export function formatDate(date: LedgerDate): string {
  const month = String(date.month).padStart(2, '0')
  const day = String(date.day).padStart(2, '0')
  return `${date.year}-${month}-${day}`
}

/**
 * Post-parse check for dates such as 2015-13-01 or 2015-02-29 that the
 * grammar accepts. Returns the date unchanged when it is a real calendar day.
 */
export function checkCalendarDate(date: LedgerDate): LedgerDate {
  if (date.month < 1 || date.month > 12) {
    throw new ValidationError(
      `Month must be between 01 and 12 in ${formatDate(date)}`,
      'month',
      date.month
    )
  }

  const lastDay = daysInMonth(date.year, date.month)
  if (date.day < 1 || date.day > lastDay) {
    throw new ValidationError(
      `Day must be between 01 and ${lastDay} in ${formatDate(date)}`,
      'day',
      date.day
    )
  }

  return date
}
