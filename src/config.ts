/**
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from 'zod'

export const ConfigSchema = z.object({
  LEDGER_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  LEDGER_PRICE_DB: z.string().min(1).default('prices.db')
})

export type AppConfig = z.infer<typeof ConfigSchema>

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is set to an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  return ConfigSchema.parse(env)
}
