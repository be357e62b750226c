import { pino, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

export interface LoggerOptions {
  level?: LevelWithSilent
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'journal-grammar',
    level: options.level ?? 'info'
  })
}
