import { z } from 'zod'
import type { RetryPolicy } from '../core/services/retry.js'

export const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof logLevels)[number]

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(value => value === 'true' || value === '1')

export const bankingEnvironmentSchema = z.object({
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
  LOG_LEVEL: z.enum(logLevels).optional(),
  SERVICE_NAME: z.string().trim().min(1, { message: 'Service name cannot be empty' }).default('kasboek'),
  DATABASE_URL: z.string().url({ message: 'Invalid database URL' }).optional(),
  BANK_DEFAULT_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, { message: 'Currency must be a 3-letter code' })
    .transform(value => value.toUpperCase())
    .default('BRL'),
  BANK_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  BANK_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(10_000).default(0),
  BANK_LOCK_TIMEOUT_MS: z.coerce.number().int().min(1).max(600_000).default(2000),
  BANK_LOCK_MODE: z.enum(['wait', 'nowait']).default('wait'),
  BANK_ROW_LOCKING: booleanString
})

export type BankingEnvironment = z.infer<typeof bankingEnvironmentSchema>

/**
 * The variables the default logger needs. Unknown values fall back to
 * defaults instead of failing.
 */
export const loggingEnvironmentSchema = z.object({
  NODE_ENV: bankingEnvironmentSchema.shape.NODE_ENV.catch('production'),
  LOG_LEVEL: z.enum(logLevels).optional().catch(undefined),
  SERVICE_NAME: bankingEnvironmentSchema.shape.SERVICE_NAME.catch('kasboek')
})

export type LockMode = 'wait' | 'nowait'

export interface LockingConfig {
  /** How long a locking read waits before reporting a conflict */
  timeoutMs: number
  mode: LockMode
  /** When false, locking reads fall back to plain reads plus the version check */
  rowLocking: boolean
}

export interface BankingConfig {
  nodeEnv: BankingEnvironment['NODE_ENV']
  logLevel: LogLevel
  serviceName: string
  databaseUrl?: string
  defaultCurrency: string
  retry: RetryPolicy
  locking: LockingConfig
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
  }
}

export type LoggingConfig = Pick<BankingConfig, 'nodeEnv' | 'logLevel' | 'serviceName'>

export function loadLoggingConfig(environment: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const env = loggingEnvironmentSchema.parse(environment)
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    serviceName: env.SERVICE_NAME
  }
}

/**
 * Read and validate configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(environment: NodeJS.ProcessEnv = process.env): BankingConfig {
  const parsed = bankingEnvironmentSchema.safeParse(environment)

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const env = parsed.data

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    serviceName: env.SERVICE_NAME,
    databaseUrl: env.DATABASE_URL,
    defaultCurrency: env.BANK_DEFAULT_CURRENCY,
    retry: {
      maxAttempts: env.BANK_RETRY_MAX_ATTEMPTS,
      backoffMs: env.BANK_RETRY_BACKOFF_MS
    },
    locking: {
      timeoutMs: env.BANK_LOCK_TIMEOUT_MS,
      mode: env.BANK_LOCK_MODE,
      rowLocking: env.BANK_ROW_LOCKING
    }
  }
}

function defaultLogLevel(nodeEnv: BankingConfig['nodeEnv']): LogLevel {
  return nodeEnv === 'test' ? 'silent' : 'info'
}
