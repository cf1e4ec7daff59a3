import type { UnitOfWorkFactory } from '../ports/unit-of-work.js'
import type { RetryPolicy } from './retry.js'
import type { Logger } from '../../logging/logger.js'

export interface UseCaseOptions {
  unitOfWork: UnitOfWorkFactory
  /** Used when a command does not name a currency */
  defaultCurrency?: string
  retryPolicy?: RetryPolicy
  logger?: Logger
}

export const FALLBACK_CURRENCY = 'BRL'
