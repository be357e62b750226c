import type { AccountPath } from '../domain/account.js'
import type { Amount } from '../domain/amount.js'
import type { LedgerDate } from '../domain/date.js'
import type { Header } from '../domain/header.js'
import type { Price, PriceDatabase } from '../domain/price.js'
import { ParseError } from '../errors/parse-error.js'
import { account } from './account.js'
import { amount } from './amount.js'
import { type Parser, eof, skip } from './combinators.js'
import { remaining, startOf } from './cursor.js'
import { date } from './date.js'
import { header } from './header.js'
import { price, priceDatabase } from './price.js'

export type RunResult<T> =
  | { ok: true; value: T; rest: string }
  | { ok: false; error: ParseError }

/**
 * Parses a prefix of `input`. Never throws; `rest` is what was not read.
 */
export function runParser<T>(parser: Parser<T>, input: string): RunResult<T> {
  const result = parser(startOf(input))
  if (!result.ok) {
    return { ok: false, error: ParseError.fromFailure(result.failure) }
  }
  return { ok: true, value: result.value, rest: remaining(result.cursor) }
}

/**
 * Parses the whole of `input`.
 * @throws {ParseError} positioned where parsing stopped
 */
export function parseAll<T>(parser: Parser<T>, input: string): T {
  const result = runParser(skip(parser, eof), input)
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

export function parseDate(input: string): LedgerDate {
  return parseAll(date, input)
}

export function parseHeader(input: string): Header {
  return parseAll(header, input)
}

export function parseAccount(input: string): AccountPath {
  return parseAll(account, input)
}

export function parseAmount(input: string): Amount {
  return parseAll(amount, input)
}

export function parsePrice(input: string): Price {
  return parseAll(price, input)
}

export function parsePriceDatabase(input: string): PriceDatabase {
  return parseAll(priceDatabase, input)
}
