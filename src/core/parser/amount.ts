import { type Amount, AmountFormat } from '../domain/amount.js'
import type { CommoditySymbol } from '../domain/commodity.js'
import {
  type Parser,
  alt,
  char,
  label,
  many,
  many1,
  map,
  optional,
  satisfy,
  seq,
  text
} from './combinators.js'
import { digit, whitespace } from './primitives.js'

/**
 * Removes thousands separators. `-1,110.38` becomes `-1110.38`.
 */
export function normalizeQuantity(quantity: string): string {
  return quantity.replace(/,/g, '')
}

/**
 * Signed decimal with optional grouping commas, returned as normalized text.
 * The number of points is not checked: `1.2.3` is accepted as written.
 */
export const quantity: Parser<string> = map(
  seq(
    optional(char('-')),
    digit,
    many(alt(digit, char(','), char('.')))
  ),
  ([sign, first, rest]) => normalizeQuantity(`${sign ?? ''}${first}${rest.join('')}`)
)

export const quotedSymbol: Parser<CommoditySymbol> = map(
  seq(
    char('"'),
    text(many1(satisfy(c => c !== '"' && c !== '\r' && c !== '\n', 'symbol character'))),
    char('"')
  ),
  ([, value]) => ({ value, quoted: true })
)

// Digits and '-' can never start a symbol, which keeps it apart from a quantity.
const NOT_IN_UNQUOTED_SYMBOL = new Set('-0123456789; "\t\r\n')

export const unquotedSymbol: Parser<CommoditySymbol> = map(
  text(many1(satisfy(c => !NOT_IN_UNQUOTED_SYMBOL.has(c), 'symbol'))),
  value => ({ value, quoted: false })
)

export const symbol: Parser<CommoditySymbol> = label(alt(quotedSymbol, unquotedSymbol), 'symbol')

/** `$13,245.00` or `$ 13,245.00` */
export const amountSymbolThenQuantity: Parser<Amount> = map(
  seq(symbol, optional(whitespace), quantity),
  ([symbol, space, value]) => ({
    value,
    symbol,
    format: space === undefined
      ? AmountFormat.SymbolLeftNoSpace
      : AmountFormat.SymbolLeftWithSpace
  })
)

/** `13,245.463AAPL` or `13,245.463 "MUTF2351"` */
export const amountQuantityThenSymbol: Parser<Amount> = map(
  seq(quantity, optional(whitespace), symbol),
  ([value, space, symbol]) => ({
    value,
    symbol,
    format: space === undefined
      ? AmountFormat.SymbolRightNoSpace
      : AmountFormat.SymbolRightWithSpace
  })
)

/**
 * Symbol-first is tried before quantity-first. A symbol never starts with a
 * digit or '-', so input that starts like a quantity always falls through to
 * the second form.
 */
export const amount: Parser<Amount> = alt(amountSymbolThenQuantity, amountQuantityThenSymbol)
