import { type Cursor, advance, isAtEnd, peek } from './cursor.js'

/**
 * Where a parse stopped and what would have been accepted there.
 */
export interface Failure {
  readonly cursor: Cursor
  readonly expected: readonly string[]
}

export interface Success<T> {
  readonly ok: true
  readonly value: T
  readonly cursor: Cursor
  readonly consumed: boolean
  /**
   * Failure of an optional branch that was rejected at `cursor`. If the next
   * parser also fails there, both expectations are reported together.
   */
  readonly hint?: Failure
}

export interface Failed {
  readonly ok: false
  readonly failure: Failure
  readonly consumed: boolean
}

export type ParseResult<T> = Success<T> | Failed

/**
 * A production: reads a prefix of the input at `cursor`.
 *
 * `consumed` tells choice combinators whether the production committed. A
 * failure that consumed input is never retried with another alternative.
 */
export type Parser<T> = (cursor: Cursor) => ParseResult<T>

export function mergeFailures(a: Failure, b: Failure): Failure {
  if (a.cursor.offset > b.cursor.offset) return a
  if (b.cursor.offset > a.cursor.offset) return b

  const expected = [...a.expected]
  for (const label of b.expected) {
    if (!expected.includes(label)) {
      expected.push(label)
    }
  }
  return { cursor: a.cursor, expected }
}

function mergeHints(a: Failure | undefined, b: Failure | undefined): Failure | undefined {
  if (!a) return b
  if (!b) return a
  return mergeFailures(a, b)
}

function withHint(hint: Failure | undefined, failure: Failure): Failure {
  return hint ? mergeFailures(hint, failure) : failure
}

const ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
}

function escape(text: string): string {
  return Array.from(text, c => ESCAPES[c] ?? c).join('')
}

export function describeChar(char: string): string {
  return `'${escape(char)}'`
}

export function succeed<T>(value: T): Parser<T> {
  return cursor => ({ ok: true, value, cursor, consumed: false })
}

export const eof: Parser<undefined> = cursor => {
  if (isAtEnd(cursor)) {
    return { ok: true, value: undefined, cursor, consumed: false }
  }
  return { ok: false, failure: { cursor, expected: ['end of input'] }, consumed: false }
}

export function satisfy(predicate: (char: string) => boolean, expected: string): Parser<string> {
  return cursor => {
    const char = peek(cursor)
    if (char === undefined || !predicate(char)) {
      return { ok: false, failure: { cursor, expected: [expected] }, consumed: false }
    }
    return { ok: true, value: char, cursor: advance(cursor, char), consumed: true }
  }
}

export function char(expected: string): Parser<string> {
  return satisfy(c => c === expected, describeChar(expected))
}

/**
 * Matches `text` character by character. A partial match has consumed input.
 */
export function literal(text: string): Parser<string> {
  const label = `"${escape(text)}"`
  return start => {
    let cursor = start
    for (const expected of text) {
      const actual = peek(cursor)
      if (actual !== expected) {
        return {
          ok: false,
          failure: { cursor, expected: [label] },
          consumed: cursor.offset > start.offset
        }
      }
      cursor = advance(cursor, actual)
    }
    return { ok: true, value: text, cursor, consumed: cursor.offset > start.offset }
  }
}

export function map<A, B>(parser: Parser<A>, f: (value: A) => B): Parser<B> {
  return cursor => {
    const result = parser(cursor)
    return result.ok ? { ...result, value: f(result.value) } : result
  }
}

/**
 * Replaces the expectations of a failure that consumed nothing.
 */
export function label<T>(parser: Parser<T>, expected: string): Parser<T> {
  return cursor => {
    const result = parser(cursor)
    if (result.ok || result.consumed) return result
    return { ok: false, failure: { cursor: result.failure.cursor, expected: [expected] }, consumed: false }
  }
}

export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]>
export function seq<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]>
export function seq<A, B, C, D>(
  a: Parser<A>, b: Parser<B>, c: Parser<C>, d: Parser<D>
): Parser<[A, B, C, D]>
export function seq<A, B, C, D, E>(
  a: Parser<A>, b: Parser<B>, c: Parser<C>, d: Parser<D>, e: Parser<E>
): Parser<[A, B, C, D, E]>
export function seq<A, B, C, D, E, F>(
  a: Parser<A>, b: Parser<B>, c: Parser<C>, d: Parser<D>, e: Parser<E>, f: Parser<F>
): Parser<[A, B, C, D, E, F]>
export function seq(...parsers: Parser<unknown>[]): Parser<unknown[]> {
  return start => {
    const values: unknown[] = []
    let cursor = start
    let consumed = false
    let hint: Failure | undefined

    for (const parser of parsers) {
      const result = parser(cursor)
      if (!result.ok) {
        return {
          ok: false,
          failure: withHint(hint, result.failure),
          consumed: consumed || result.consumed
        }
      }

      values.push(result.value)
      hint = result.consumed ? result.hint : mergeHints(hint, result.hint)
      cursor = result.cursor
      consumed = consumed || result.consumed
    }

    return { ok: true, value: values, cursor, consumed, hint }
  }
}

/** Runs both, keeps the value of the first. */
export function skip<T>(parser: Parser<T>, ignored: Parser<unknown>): Parser<T> {
  return map(seq(parser, ignored), ([value]) => value)
}

/** Runs both, keeps the value of the second. */
export function right<T>(ignored: Parser<unknown>, parser: Parser<T>): Parser<T> {
  return map(seq(ignored, parser), ([, value]) => value)
}

export function optional<T>(parser: Parser<T>): Parser<T | undefined> {
  return cursor => {
    const result = parser(cursor)
    if (result.ok || result.consumed) return result
    return { ok: true, value: undefined, cursor, consumed: false, hint: result.failure }
  }
}

export function many<T>(parser: Parser<T>): Parser<T[]> {
  return start => {
    const values: T[] = []
    let cursor = start
    let consumed = false
    let hint: Failure | undefined

    while (true) {
      const result = parser(cursor)

      if (!result.ok) {
        if (result.consumed) {
          return { ok: false, failure: withHint(hint, result.failure), consumed: true }
        }
        return { ok: true, value: values, cursor, consumed, hint: withHint(hint, result.failure) }
      }

      if (!result.consumed) {
        throw new Error('many() applied to a parser that accepts empty input')
      }

      values.push(result.value)
      cursor = result.cursor
      consumed = true
      hint = result.hint
    }
  }
}

export function many1<T>(parser: Parser<T>): Parser<T[]> {
  return map(seq(parser, many(parser)), ([first, rest]) => [first, ...rest])
}

/** Concatenates the characters read by `parser`. */
export function text(parser: Parser<string[]>): Parser<string> {
  return map(parser, chars => chars.join(''))
}

/**
 * Ordered choice. The first alternative that succeeds, or that fails after
 * consuming input, decides the result. If all fail without consuming, their
 * expectations are reported together.
 */
export function alt<T>(...alternatives: Parser<T>[]): Parser<T> {
  return cursor => {
    let failure: Failure | undefined

    for (const alternative of alternatives) {
      const result = alternative(cursor)
      if (result.ok) {
        return result.consumed ? result : { ...result, hint: mergeHints(failure, result.hint) }
      }
      if (result.consumed) {
        return result
      }
      failure = withHint(failure, result.failure)
    }

    return { ok: false, failure: failure ?? { cursor, expected: [] }, consumed: false }
  }
}

export function sepBy1<T>(parser: Parser<T>, separator: Parser<unknown>): Parser<T[]> {
  return map(
    seq(parser, many(right(separator, parser))),
    ([first, rest]) => [first, ...rest]
  )
}

export function sepBy<T>(parser: Parser<T>, separator: Parser<unknown>): Parser<T[]> {
  return alt(sepBy1(parser, separator), succeed<T[]>([]))
}
