import { Decimal, isDecimalText } from '../utils/decimal.js'
import { ValidationError } from '../errors/validation-error.js'
import { type CommoditySymbol, sameSymbol } from './commodity.js'

export enum AmountFormat {
  SymbolLeftNoSpace = 'SymbolLeftNoSpace',
  SymbolLeftWithSpace = 'SymbolLeftWithSpace',
  SymbolRightNoSpace = 'SymbolRightNoSpace',
  SymbolRightWithSpace = 'SymbolRightWithSpace'
}

export interface Amount {
  /** Decimal text with grouping commas removed, e.g. `-1110.38` */
  readonly value: string
  readonly symbol: CommoditySymbol
  readonly format: AmountFormat
}

export function amountToDecimal(amount: Amount): Decimal {
  if (!isDecimalText(amount.value)) {
    throw new ValidationError(
      `Quantity ${amount.value} is not a decimal number`,
      'value',
      amount.value
    )
  }
  return new Decimal(amount.value)
}

/**
 * Token equality: `$5` and `$ 5` are different amounts.
 */
export function sameAmount(a: Amount, b: Amount): boolean {
  return a.value === b.value &&
    sameSymbol(a.symbol, b.symbol) &&
    a.format === b.format
}
