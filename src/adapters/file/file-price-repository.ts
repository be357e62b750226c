import { compareDates, type LedgerDate } from '../../core/domain/date.js'
import type { Price, PriceDatabase } from '../../core/domain/price.js'
import type { PriceFilter, PriceRepository } from '../../core/ports/price-repository.js'
import { ParseError } from '../../core/errors/parse-error.js'
import { parsePriceDatabase } from '../../core/parser/run.js'
import { createLogger, type Logger } from '../../logger.js'
import { type FileProvider, NodeFileProvider } from './file-provider.js'

export interface FilePriceRepositoryOptions {
  /**
   * Path to the price database file
   */
  priceDbPath: string

  /**
   * File provider implementation.
   * Defaults to NodeFileProvider.
   */
  fileProvider?: FileProvider

  logger?: Logger
}

function matchesFilter(price: Price, filter: PriceFilter): boolean {
  if (filter.symbol !== undefined && price.symbol.value !== filter.symbol) {
    return false
  }
  if (filter.quoteSymbol !== undefined && price.amount.symbol.value !== filter.quoteSymbol) {
    return false
  }
  if (filter.fromDate && compareDates(price.date, filter.fromDate) < 0) {
    return false
  }
  if (filter.toDate && compareDates(price.date, filter.toDate) > 0) {
    return false
  }
  return true
}

/**
 * Read-only price repository over a price database file, one `P` record per
 * line. Parsed records are cached until the file's modification time changes.
 */
export class FilePriceRepository implements PriceRepository {
  private readonly priceDbPath: string
  private readonly fileProvider: FileProvider
  private readonly logger: Logger

  private cachedPrices: PriceDatabase | null = null
  private cacheVersion: string | null = null

  constructor(options: FilePriceRepositoryOptions) {
    this.priceDbPath = options.priceDbPath
    this.fileProvider = options.fileProvider ?? new NodeFileProvider()
    this.logger = options.logger ?? createLogger()
  }

  async listPrices(filter?: PriceFilter): Promise<Price[]> {
    const prices = await this.loadPrices()
    return filter
      ? prices.filter(price => matchesFilter(price, filter))
      : [...prices]
  }

  async getPrice(
    symbol: string,
    quoteSymbol: string,
    asOfDate?: LedgerDate
  ): Promise<Price | null> {
    const candidates = await this.listPrices({ symbol, quoteSymbol, toDate: asOfDate })

    let latest: Price | null = null
    for (const candidate of candidates) {
      if (!latest || compareDates(candidate.date, latest.date) >= 0) {
        latest = candidate
      }
    }
    return latest
  }

  async listSymbols(): Promise<string[]> {
    const prices = await this.loadPrices()
    const symbols = new Set<string>()

    for (const price of prices) {
      symbols.add(price.symbol.value)
    }

    return Array.from(symbols).sort()
  }

  private async loadPrices(): Promise<PriceDatabase> {
    const stat = await this.fileProvider.stat(this.priceDbPath)
    const version = stat?.lastModified.toISOString() ?? 'empty'

    if (this.cachedPrices && this.cacheVersion === version) {
      return this.cachedPrices
    }

    const content = await this.fileProvider.read(this.priceDbPath)

    let prices: PriceDatabase
    try {
      // Records are separated by line endings, so a final newline would
      // start a record that never comes.
      prices = parsePriceDatabase(content.replace(/(\r?\n)+$/, ''))
    } catch (e) {
      if (e instanceof ParseError) {
        this.logger.error(
          { path: this.priceDbPath, line: e.line, column: e.column, expected: e.expected },
          'Failed to parse price database'
        )
      }
      throw e
    }

    this.logger.debug(
      { path: this.priceDbPath, count: prices.length },
      'Loaded price database'
    )

    this.cachedPrices = prices
    this.cacheVersion = version

    return prices
  }
}
