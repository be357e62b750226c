import type { LedgerDate } from './date.js'
import type { CommoditySymbol } from './commodity.js'
import type { Amount } from './amount.js'

/**
 * `P 2015-10-25 AAPL $313.38`: AAPL was worth $313.38 on that day.
 */
export interface Price {
  readonly date: LedgerDate
  readonly symbol: CommoditySymbol
  readonly amount: Amount
}

/** Price records in file order. */
export type PriceDatabase = readonly Price[]
