import { loadConfig } from '../../config.js'
import { createLogger, type Logger } from '../../logger.js'
import { FilePriceRepository } from './file-price-repository.js'
import type { FileProvider } from './file-provider.js'

export { FilePriceRepository, type FilePriceRepositoryOptions } from './file-price-repository.js'
export { type FileProvider, NodeFileProvider, InMemoryFileProvider } from './file-provider.js'

export interface CreateFilePriceRepositoryOptions {
  /**
   * Path to the price database. Defaults to `LEDGER_PRICE_DB`.
   */
  priceDbPath?: string

  /**
   * Custom file provider. Uses NodeFileProvider by default.
   */
  fileProvider?: FileProvider

  /**
   * Logger to use. By default one is created at `LEDGER_LOG_LEVEL`.
   */
  logger?: Logger

  /**
   * Environment to read configuration from. Defaults to process.env.
   */
  env?: Record<string, string | undefined>
}

/**
 * Create a price repository backed by a price database file.
 *
 * @example
 * ```typescript
 * const prices = createFilePriceRepository({ priceDbPath: './prices.db' })
 * const latest = await prices.getPrice('AAPL', '$')
 * ```
 */
export function createFilePriceRepository(
  options: CreateFilePriceRepositoryOptions = {}
): FilePriceRepository {
  const config = loadConfig(options.env)

  return new FilePriceRepository({
    priceDbPath: options.priceDbPath ?? config.LEDGER_PRICE_DB,
    fileProvider: options.fileProvider,
    logger: options.logger ?? createLogger({ level: config.LEDGER_LOG_LEVEL })
  })
}
