/**
 * Immutable read position over the journal text.
 *
 * Line and column are 1-based. Every parser receives a cursor and hands back
 * a new one, so rewinding after a failed alternative is just reusing the
 * cursor it started from.
 */
export interface Cursor {
  readonly input: string
  readonly offset: number
  readonly line: number
  readonly column: number
}

export function startOf(input: string): Cursor {
  return { input, offset: 0, line: 1, column: 1 }
}

/**
 * The character at the cursor, or undefined at end of input.
 * Astral characters are returned whole rather than as surrogate halves.
 */
export function peek(cursor: Cursor): string | undefined {
  const code = cursor.input.codePointAt(cursor.offset)
  return code === undefined ? undefined : String.fromCodePoint(code)
}

export function advance(cursor: Cursor, char: string): Cursor {
  if (char === '\n') {
    return {
      input: cursor.input,
      offset: cursor.offset + char.length,
      line: cursor.line + 1,
      column: 1
    }
  }

  return {
    input: cursor.input,
    offset: cursor.offset + char.length,
    line: cursor.line,
    column: cursor.column + 1
  }
}

export function isAtEnd(cursor: Cursor): boolean {
  return cursor.offset >= cursor.input.length
}

export function remaining(cursor: Cursor): string {
  return cursor.input.slice(cursor.offset)
}
