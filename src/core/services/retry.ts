import { setTimeout as sleep } from 'node:timers/promises'
import { Result, ResultAsync, err, ok } from 'neverthrow'
import { ConcurrencyConflictError } from '../errors/concurrency-error.js'
import type { Logger } from '../../logging/logger.js'

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number
  /** Linear backoff: attempt n waits n * backoffMs before the next try */
  backoffMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 0
}

export interface RetryContext {
  operation: string
  logger: Logger
  fields?: Record<string, unknown>
}

export interface Attempted<T> {
  value: T
  attempts: number
}

export function isConcurrencyConflict(error: unknown): error is ConcurrencyConflictError {
  return error instanceof ConcurrencyConflictError
}

/**
 * Run `attempt` until it succeeds, fails with anything other than a
 * concurrency conflict, or the policy runs out of attempts. Each call to
 * `attempt` must start from a brand-new unit of work.
 */
export function retryOnConflict<T, E>(
  policy: RetryPolicy,
  context: RetryContext,
  attempt: (attemptNumber: number) => ResultAsync<T, E>
): ResultAsync<Attempted<T>, E | ConcurrencyConflictError> {
  return new ResultAsync(runWithRetry(policy, context, attempt))
}

async function runWithRetry<T, E>(
  policy: RetryPolicy,
  context: RetryContext,
  attempt: (attemptNumber: number) => ResultAsync<T, E>
): Promise<Result<Attempted<T>, E | ConcurrencyConflictError>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))
  let lastConflict: ConcurrencyConflictError | undefined

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
    const result = await attempt(attemptNumber)

    if (result.isOk()) {
      return ok({ value: result.value, attempts: attemptNumber })
    }

    const error = result.error
    if (!isConcurrencyConflict(error)) {
      return err(error)
    }

    lastConflict = error
    context.logger.warn(
      {
        ...context.fields,
        operation: context.operation,
        attempt: attemptNumber,
        maxAttempts,
        reason: error.reason
      },
      'concurrency_conflict_retry'
    )

    if (attemptNumber < maxAttempts && policy.backoffMs > 0) {
      await sleep(policy.backoffMs * attemptNumber)
    }
  }

  const exhausted = ConcurrencyConflictError.exhausted(
    maxAttempts,
    lastConflict ?? new ConcurrencyConflictError('retries_exhausted', `${context.operation} did not complete`)
  )

  context.logger.error(
    {
      ...context.fields,
      operation: context.operation,
      attempts: maxAttempts
    },
    'concurrency_retries_exhausted'
  )

  return err(exhausted)
}
