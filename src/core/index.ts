// Domain
export { Money, type MoneyError } from './domain/money.js'
export { AccountNumber } from './domain/account-number.js'
export { type AccountId, generateAccountId } from './domain/account-id.js'
export { Account, type AccountProps, type DepositError, type WithdrawError } from './domain/account.js'
export {
  LedgerEntry,
  LEDGER_ENTRY_TYPES,
  type LedgerEntryType,
  type LedgerEntryProps,
  type CreateLedgerEntryProps
} from './domain/ledger-entry.js'

// Ports
export { type AccountStore, type AccountReadError, type AccountWriteError } from './ports/account-store.js'
export { type LedgerStore, type LedgerPage, type LedgerError } from './ports/ledger-store.js'
export { type UnitOfWork, type UnitOfWorkFactory, type CommitError } from './ports/unit-of-work.js'

// Commands & results
export type {
  CreateAccountCommand,
  DepositCommand,
  WithdrawCommand,
  TransferCommand,
  GetBalanceQuery,
  GetTransactionsQuery
} from './dto/commands.js'
export {
  type AccountCreatedResult,
  type BalanceResult,
  type TransferResult,
  type LedgerEntryResult,
  toLedgerEntryResult
} from './dto/results.js'

// Services
export { BankingService, type BankingServiceOptions } from './services/banking-service.js'
export { CreateAccountUseCase } from './services/create-account.js'
export { DepositUseCase } from './services/deposit.js'
export { WithdrawUseCase } from './services/withdraw.js'
export { TransferUseCase } from './services/transfer.js'
export { GetBalanceUseCase } from './services/get-balance.js'
export { GetTransactionsUseCase } from './services/get-transactions.js'
export { type UseCaseOptions } from './services/use-case-options.js'
export {
  retryOnConflict,
  isConcurrencyConflict,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryContext,
  type Attempted
} from './services/retry.js'
export { withUnitOfWork } from './services/unit-of-work-scope.js'
export { lockAccountsInOrder, lockOrder, type LockedAccounts } from './services/lock-order.js'

// Errors
export * from './errors/index.js'

// Utils
export { Decimal, type DecimalInput } from './utils/decimal.js'
