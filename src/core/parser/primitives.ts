import {
  type Parser,
  alt,
  char,
  literal,
  many1,
  map,
  satisfy,
  seq,
  text
} from './combinators.js'

export function isDigit(char: string): boolean {
  return char >= '0' && char <= '9'
}

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t'
}

/** Line the cursor is on. Reads nothing. */
export const lineNumber: Parser<number> = cursor => ({
  ok: true,
  value: cursor.line,
  cursor,
  consumed: false
})

/** One or more spaces or tabs. */
export const whitespace: Parser<string> = text(many1(satisfy(isBlank, 'whitespace')))

/** `\r\n` or `\n`, both reported as `\n`. */
export const lineEnding: Parser<string> = alt(
  map(literal('\r\n'), () => '\n'),
  char('\n')
)

export const digit: Parser<string> = satisfy(isDigit, 'digit')

export function twoDigitsToInt([tens, ones]: readonly [string, string]): number {
  return Number(tens) * 10 + Number(ones)
}

/** Exactly two digits as a number, e.g. `09` is 9. */
export const twoDigits: Parser<number> = map(seq(digit, digit), twoDigitsToInt)
