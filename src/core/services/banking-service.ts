import type { ResultAsync } from 'neverthrow'
import type { UnitOfWorkFactory } from '../ports/unit-of-work.js'
import type {
  CreateAccountCommand,
  DepositCommand,
  GetBalanceQuery,
  GetTransactionsQuery,
  TransferCommand,
  WithdrawCommand
} from '../dto/commands.js'
import type {
  AccountCreatedResult,
  BalanceResult,
  LedgerEntryResult,
  TransferResult
} from '../dto/results.js'
import type { BankingError } from '../errors/index.js'
import { CreateAccountUseCase } from './create-account.js'
import { DepositUseCase } from './deposit.js'
import { WithdrawUseCase } from './withdraw.js'
import { TransferUseCase } from './transfer.js'
import { GetBalanceUseCase } from './get-balance.js'
import { GetTransactionsUseCase } from './get-transactions.js'
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js'
import { FALLBACK_CURRENCY } from './use-case-options.js'
import { getLogger, type Logger } from '../../logging/logger.js'

export interface BankingServiceOptions {
  unitOfWork: UnitOfWorkFactory
  defaultCurrency?: string
  retryPolicy?: RetryPolicy
  logger?: Logger
}

/**
 * The whole inbound surface: four commands and two queries. An HTTP, CLI or
 * RPC adapter only needs to bridge to these methods.
 */
export class BankingService {
  private readonly createAccountUseCase: CreateAccountUseCase
  private readonly depositUseCase: DepositUseCase
  private readonly withdrawUseCase: WithdrawUseCase
  private readonly transferUseCase: TransferUseCase
  private readonly getBalanceUseCase: GetBalanceUseCase
  private readonly getTransactionsUseCase: GetTransactionsUseCase

  constructor(options: BankingServiceOptions) {
    const logger = options.logger ?? getLogger('banking')
    const shared = {
      unitOfWork: options.unitOfWork,
      defaultCurrency: options.defaultCurrency ?? FALLBACK_CURRENCY,
      retryPolicy: options.retryPolicy ?? DEFAULT_RETRY_POLICY
    }

    this.createAccountUseCase = new CreateAccountUseCase({
      ...shared,
      logger: logger.child({ useCase: 'create-account' })
    })
    this.depositUseCase = new DepositUseCase({ ...shared, logger: logger.child({ useCase: 'deposit' }) })
    this.withdrawUseCase = new WithdrawUseCase({ ...shared, logger: logger.child({ useCase: 'withdraw' }) })
    this.transferUseCase = new TransferUseCase({ ...shared, logger: logger.child({ useCase: 'transfer' }) })
    this.getBalanceUseCase = new GetBalanceUseCase({
      ...shared,
      logger: logger.child({ useCase: 'get-balance' })
    })
    this.getTransactionsUseCase = new GetTransactionsUseCase({
      ...shared,
      logger: logger.child({ useCase: 'get-transactions' })
    })
  }

  // === Commands ===

  createAccount(command: CreateAccountCommand): ResultAsync<AccountCreatedResult, BankingError> {
    return this.createAccountUseCase.execute(command)
  }

  deposit(command: DepositCommand): ResultAsync<BalanceResult, BankingError> {
    return this.depositUseCase.execute(command)
  }

  withdraw(command: WithdrawCommand): ResultAsync<BalanceResult, BankingError> {
    return this.withdrawUseCase.execute(command)
  }

  transfer(command: TransferCommand): ResultAsync<TransferResult, BankingError> {
    return this.transferUseCase.execute(command)
  }

  // === Queries ===

  getBalance(query: GetBalanceQuery): ResultAsync<BalanceResult, BankingError> {
    return this.getBalanceUseCase.execute(query)
  }

  getTransactions(query: GetTransactionsQuery): ResultAsync<LedgerEntryResult[], BankingError> {
    return this.getTransactionsUseCase.execute(query)
  }
}
