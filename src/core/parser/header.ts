import { type Header, TransactionStatus } from '../domain/header.js'
import {
  type Parser,
  alt,
  char,
  many,
  many1,
  map,
  optional,
  satisfy,
  seq,
  skip,
  text
} from './combinators.js'
import { date } from './date.js'
import { lineNumber, whitespace } from './primitives.js'

/** `*` is cleared, `!` uncleared. */
export const status: Parser<TransactionStatus> = alt(
  map(char('*'), () => TransactionStatus.Cleared),
  map(char('!'), () => TransactionStatus.Uncleared)
)

/** `(cheque #802)`; `()` gives an empty code. */
export const code: Parser<string> = map(
  seq(
    char('('),
    text(many(satisfy(c => c !== '\r' && c !== '\n' && c !== ')', 'code character'))),
    char(')')
  ),
  ([, body]) => body
)

/**
 * Everything up to a comment or the end of the line. Trailing spaces before
 * `;` are kept.
 */
export const payee: Parser<string> = text(
  many1(satisfy(c => c !== ';' && c !== '\r' && c !== '\n', 'payee'))
)

/** `;` and the rest of the line, without the `;`. */
export const comment: Parser<string> = map(
  seq(char(';'), text(many(satisfy(c => c !== '\r' && c !== '\n', 'comment character')))),
  ([, body]) => body
)

export const header: Parser<Header> = map(
  seq(
    lineNumber,
    skip(date, whitespace),
    skip(status, whitespace),
    optional(skip(code, whitespace)),
    payee,
    optional(comment)
  ),
  ([lineNumber, date, status, code, payee, comment]) => ({
    lineNumber,
    date,
    status,
    code,
    payee,
    comment
  })
)
