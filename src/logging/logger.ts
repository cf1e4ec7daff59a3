import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino'
import { loadLoggingConfig, type LoggingConfig } from '../config/config.js'

export type { Logger, LoggingConfig }

const loggerCache = new Map<string, Logger>()

let rootLogger: Logger | undefined

/**
 * Build a root logger. Development gets pino-pretty, everything else
 * writes JSON lines to stdout.
 */
export function createRootLogger(config: LoggingConfig, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    base: {
      service: config.serviceName,
      environment: config.nodeEnv
    },
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime
  }

  if (destination) {
    return pino(options, destination)
  }

  if (config.nodeEnv === 'development' && config.logLevel !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,service,environment,category',
        messageFormat: '[{category}]: {msg}',
        translateTime: 'yyyy-mm-dd HH:MM:ss.l'
      }
    }
  }

  return pino(options)
}

/**
 * Replace the root logger, e.g. once configuration has been loaded.
 */
export function configureLogging(config: LoggingConfig, destination?: DestinationStream): Logger {
  rootLogger = createRootLogger(config, destination)
  loggerCache.clear()
  return rootLogger
}

/**
 * Child logger for a category, created from the environment on first use.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category)
  if (cached) {
    return cached
  }

  if (!rootLogger) {
    rootLogger = createRootLogger(loadLoggingConfig())
  }

  const logger = rootLogger.child({ category })
  loggerCache.set(category, logger)
  return logger
}
