export { type Cursor, startOf, peek, advance, isAtEnd, remaining } from './cursor.js'
export {
  type Parser,
  type ParseResult,
  type Success,
  type Failed,
  type Failure,
  mergeFailures,
  describeChar,
  succeed,
  eof,
  satisfy,
  char,
  literal,
  map,
  label,
  seq,
  skip,
  right,
  optional,
  many,
  many1,
  text,
  alt,
  sepBy,
  sepBy1
} from './combinators.js'
export { lineNumber, whitespace, lineEnding, digit, twoDigits, twoDigitsToInt, isDigit } from './primitives.js'
export { date, year } from './date.js'
export {
  quantity,
  normalizeQuantity,
  quotedSymbol,
  unquotedSymbol,
  symbol,
  amountSymbolThenQuantity,
  amountQuantityThenSymbol,
  amount
} from './amount.js'
export { status, code, payee, comment, header } from './header.js'
export { subAccount, account } from './account.js'
export { price, priceDatabase } from './price.js'
export {
  type RunResult,
  runParser,
  parseAll,
  parseDate,
  parseHeader,
  parseAccount,
  parseAmount,
  parsePrice,
  parsePriceDatabase
} from './run.js'
