import type { LedgerDate } from '../domain/date.js'
import type { Price } from '../domain/price.js'

export interface PriceFilter {
  /** Priced symbol, e.g. `AAPL` */
  symbol?: string
  /** Symbol of the price amount, e.g. `$` */
  quoteSymbol?: string
  fromDate?: LedgerDate
  toDate?: LedgerDate
}

export interface PriceRepository {
  /**
   * List prices in file order with optional filtering
   */
  listPrices(filter?: PriceFilter): Promise<Price[]>

  /**
   * Get the latest price for a symbol in a quote symbol as of a given date.
   * Of two prices on the same date the later one in the file wins.
   */
  getPrice(
    symbol: string,
    quoteSymbol: string,
    asOfDate?: LedgerDate
  ): Promise<Price | null>

  /**
   * Get all unique priced symbols, sorted
   */
  listSymbols(): Promise<string[]>
}
