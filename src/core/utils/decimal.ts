import { Decimal } from 'decimal.js'

// Configure Decimal.js for financial calculations
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP
})

export { Decimal }

const DECIMAL_TEXT = /^-?\d+(\.\d*)?$/

/**
 * Whether `text` is a single signed decimal literal, e.g. `-1110.38`.
 * Quantities such as `1.2.3` parse but are not decimals.
 */
export function isDecimalText(text: string): boolean {
  return DECIMAL_TEXT.test(text)
}
