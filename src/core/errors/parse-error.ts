import type { Failure } from '../parser/combinators.js'
import { describeChar } from '../parser/combinators.js'
import { peek } from '../parser/cursor.js'

function describeExpected(expected: readonly string[]): string {
  if (expected.length <= 1) return expected.join('')
  return `${expected.slice(0, -1).join(', ')} or ${expected[expected.length - 1]}`
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number,
    public readonly offset: number,
    public readonly expected: readonly string[]
  ) {
    super(`${message} at line ${line}, column ${column}`)
    this.name = 'ParseError'
  }

  static fromFailure(failure: Failure): ParseError {
    const { cursor, expected } = failure
    const char = peek(cursor)
    const found = char === undefined ? 'end of input' : describeChar(char)

    const message = expected.length === 0
      ? `Unexpected ${found}`
      : `Expected ${describeExpected(expected)} but found ${found}`

    return new ParseError(message, cursor.line, cursor.column, cursor.offset, expected)
  }
}
