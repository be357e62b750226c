import type { ParseError } from '../core/errors/parse-error.js'
import type { RunResult } from '../core/parser/run.js'

/**
 * Unwraps the error of a run that is expected to fail.
 */
export function expectFailure<T>(result: RunResult<T>): ParseError {
  if (result.ok) {
    throw new Error(`Expected parse to fail, got ${JSON.stringify(result.value)}`)
  }
  return result.error
}
