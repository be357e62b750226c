import type { LedgerDate } from '../domain/date.js'
import { type Parser, char, label, many1, map, seq, text } from './combinators.js'
import { digit, twoDigits } from './primitives.js'

const yearDigits = text(many1(digit))

/**
 * Any number of digits, leading zeros allowed. A year too large to hold
 * exactly fails at its first digit.
 */
export const year: Parser<number> = start => {
  const result = yearDigits(start)
  if (!result.ok) return result

  const value = Number.parseInt(result.value, 10)
  if (!Number.isSafeInteger(value)) {
    return { ok: false, failure: { cursor: start, expected: ['year'] }, consumed: true }
  }
  return { ...result, value }
}

/**
 * `2015-10-17`. Month and day have exactly two digits and are not
 * range-checked.
 */
export const date: Parser<LedgerDate> = label(
  map(
    seq(year, char('-'), twoDigits, char('-'), twoDigits),
    ([year, , month, , day]) => ({ year, month, day })
  ),
  'date'
)
