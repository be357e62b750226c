export * from './core/index.js'
export * from './adapters/file/index.js'
export { loadConfig, ConfigSchema, type AppConfig } from './config.js'
export { createLogger, type Logger, type LoggerOptions } from './logger.js'
