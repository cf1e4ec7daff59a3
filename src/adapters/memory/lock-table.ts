import { Result, err, ok } from 'neverthrow'
import { ConcurrencyConflictError } from '../../core/errors/concurrency-error.js'
import type { LockMode } from '../../config/config.js'

export type LockOwner = symbol

interface Waiter {
  owner: LockOwner
  grant: () => void
}

interface LockState {
  owner: LockOwner
  waiters: Waiter[]
}

/**
 * Exclusive, FIFO-fair row locks keyed by account number.
 */
export class LockTable {
  private readonly locks = new Map<string, LockState>()
  private readonly held = new Map<LockOwner, Set<string>>()

  acquire(
    key: string,
    owner: LockOwner,
    options: { timeoutMs: number; mode: LockMode }
  ): Promise<Result<void, ConcurrencyConflictError>> {
    const state = this.locks.get(key)

    if (!state) {
      this.take(key, owner, [])
      return Promise.resolve(ok(undefined))
    }

    if (state.owner === owner) {
      return Promise.resolve(ok(undefined))
    }

    if (options.mode === 'nowait') {
      return Promise.resolve(
        err(new ConcurrencyConflictError('lock_unavailable', `Row ${key} is locked by another transaction`))
      )
    }

    return new Promise(resolve => {
      const waiter: Waiter = {
        owner,
        grant: () => {
          clearTimeout(timer)
          resolve(ok(undefined))
        }
      }

      const timer = setTimeout(() => {
        const index = state.waiters.indexOf(waiter)
        if (index >= 0) {
          state.waiters.splice(index, 1)
        }
        resolve(
          err(
            new ConcurrencyConflictError(
              'lock_timeout',
              `Timed out after ${options.timeoutMs}ms waiting for a lock on row ${key}`
            )
          )
        )
      }, options.timeoutMs)

      state.waiters.push(waiter)
    })
  }

  /**
   * Release every lock held by `owner`, handing each one to its next waiter.
   */
  releaseAll(owner: LockOwner): void {
    const keys = this.held.get(owner)
    if (!keys) {
      return
    }
    this.held.delete(owner)

    for (const key of keys) {
      const state = this.locks.get(key)
      if (!state || state.owner !== owner) {
        continue
      }

      const next = state.waiters.shift()
      if (!next) {
        this.locks.delete(key)
        continue
      }

      this.take(key, next.owner, state.waiters)
      next.grant()
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key)
  }

  holderOf(key: string): LockOwner | undefined {
    return this.locks.get(key)?.owner
  }

  private take(key: string, owner: LockOwner, waiters: Waiter[]): void {
    const existing = this.locks.get(key)
    if (existing) {
      existing.owner = owner
      existing.waiters = waiters
    } else {
      this.locks.set(key, { owner, waiters })
    }

    const keys = this.held.get(owner) ?? new Set<string>()
    keys.add(key)
    this.held.set(owner, keys)
  }
}
