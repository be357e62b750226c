import type { LedgerDate } from './date.js'

export enum TransactionStatus {
  Cleared = 'Cleared',
  Uncleared = 'Uncleared'
}

/**
 * First line of a transaction, e.g. `2015-10-20 * (conf# abc-123) Payee ;Comment`.
 * An empty code `()` is `''`; a missing one is `undefined`.
 */
export interface Header {
  readonly lineNumber: number
  readonly date: LedgerDate
  readonly status: TransactionStatus
  readonly code?: string
  readonly payee: string
  readonly comment?: string
}
