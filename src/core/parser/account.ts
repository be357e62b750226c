import type { AccountPath } from '../domain/account.js'
import { type Parser, char, many1, satisfy, sepBy1, text } from './combinators.js'

const ALPHANUMERIC = /^[\p{L}\p{N}]$/u

export const subAccount: Parser<string> = text(
  many1(satisfy(c => ALPHANUMERIC.test(c), 'letter or digit'))
)

/** `Expenses:Food:Groceries` */
export const account: Parser<AccountPath> = sepBy1(subAccount, char(':'))
