export * from './core/index.js'
export {
  loadConfig,
  loadLoggingConfig,
  bankingEnvironmentSchema,
  ConfigError,
  type BankingConfig,
  type BankingEnvironment,
  type LockingConfig,
  type LockMode,
  type LogLevel
} from './config/config.js'
export { getLogger, configureLogging, createRootLogger, type Logger, type LoggingConfig } from './logging/logger.js'
