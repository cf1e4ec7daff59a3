import { BankingService } from '../../core/services/banking-service.js'
import type { RetryPolicy } from '../../core/services/retry.js'
import type { LockingConfig } from '../../config/config.js'
import type { Logger } from '../../logging/logger.js'
import { InMemoryDatabase } from './in-memory-database.js'
import { InMemoryUnitOfWorkFactory } from './in-memory-unit-of-work.js'

export { InMemoryDatabase, type StagedAccount, type CommitCheck } from './in-memory-database.js'
export {
  InMemoryUnitOfWork,
  InMemoryUnitOfWorkFactory,
  type InMemoryUnitOfWorkOptions
} from './in-memory-unit-of-work.js'
export { LockTable, type LockOwner } from './lock-table.js'

export interface CreateInMemoryBankingServiceOptions {
  /** Share one database between several services to simulate many processes */
  database?: InMemoryDatabase
  defaultCurrency?: string
  retryPolicy?: RetryPolicy
  locking?: Partial<LockingConfig>
  logger?: Logger
}

/**
 * Create a BankingService backed by process memory.
 *
 * @example
 * ```typescript
 * const banking = createInMemoryBankingService({ defaultCurrency: 'EUR' })
 * await banking.createAccount({ accountNumber: '100000' })
 * ```
 */
export function createInMemoryBankingService(
  options: CreateInMemoryBankingServiceOptions = {}
): BankingService {
  const unitOfWork = new InMemoryUnitOfWorkFactory({
    database: options.database ?? new InMemoryDatabase(),
    lockTimeoutMs: options.locking?.timeoutMs,
    lockMode: options.locking?.mode,
    rowLocking: options.locking?.rowLocking
  })

  return new BankingService({
    unitOfWork,
    defaultCurrency: options.defaultCurrency,
    retryPolicy: options.retryPolicy,
    logger: options.logger
  })
}
