export { configureLogger, resetLogger, getLogger, createJsonSink, createPrettySink } from './logger.js'
export type { LoggerConfig, LogLevel, Environment } from './logger.js'
export { ROOT_CATEGORY, VALID_LOG_LEVELS, validateLogLevel, validateEnvironment } from './constants.js'
