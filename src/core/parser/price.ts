import type { Price, PriceDatabase } from '../domain/price.js'
import { type Parser, char, map, sepBy, seq, skip } from './combinators.js'
import { amount, symbol } from './amount.js'
import { date } from './date.js'
import { lineEnding, whitespace } from './primitives.js'

/** `P 2015-10-25 "MUTF2351" $5.42` */
export const price: Parser<Price> = map(
  seq(
    skip(char('P'), whitespace),
    skip(date, whitespace),
    skip(symbol, whitespace),
    amount
  ),
  ([, date, symbol, amount]) => ({ date, symbol, amount })
)

/**
 * Price records separated by single line endings. Empty input is an empty
 * database. A trailing line ending is not accepted.
 */
export const priceDatabase: Parser<PriceDatabase> = sepBy(price, lineEnding)
