import { Account, type AccountProps } from '../../core/domain/account.js'
import type { AccountId } from '../../core/domain/account-id.js'
import { LedgerEntry, type LedgerEntryProps } from '../../core/domain/ledger-entry.js'
import { LockTable } from './lock-table.js'

interface StoredEntry {
  sequence: number
  props: LedgerEntryProps
}

export interface StagedAccount {
  props: AccountProps
  /** Version the row had when this unit first wrote it; 0 for an insert */
  expectedVersion: number
}

export type CommitCheck =
  | { status: 'ok' }
  | { status: 'version_mismatch'; accountNumber: string }
  | { status: 'duplicate_number'; accountNumber: string }

/**
 * Durable state shared by every in-memory unit of work. Holds committed rows
 * only; writes reach it through `apply` once a unit commits.
 */
export class InMemoryDatabase {
  readonly locks = new LockTable()
  private readonly accounts = new Map<AccountId, AccountProps>()
  private readonly idsByNumber = new Map<string, AccountId>()
  private readonly entries: StoredEntry[] = []
  private sequence = 0

  findAccountByNumber(number: string): Account | null {
    const id = this.idsByNumber.get(number)
    const props = id === undefined ? undefined : this.accounts.get(id)
    return props ? Account.restore({ ...props }) : null
  }

  currentVersion(id: AccountId): number | undefined {
    return this.accounts.get(id)?.version
  }

  isNumberTaken(number: string): boolean {
    return this.idsByNumber.has(number)
  }

  listEntries(accountId: AccountId): Array<{ sequence: number; entry: LedgerEntry }> {
    return this.entries
      .filter(stored => stored.props.accountId === accountId)
      .map(stored => ({ sequence: stored.sequence, entry: LedgerEntry.restore(stored.props) }))
  }

  nextSequence(): number {
    this.sequence += 1
    return this.sequence
  }

  /**
   * Check that every staged row still has the version it was read at.
   */
  check(staged: Iterable<StagedAccount>): CommitCheck {
    for (const { props, expectedVersion } of staged) {
      const current = this.accounts.get(props.id)

      if (expectedVersion === 0) {
        if (current !== undefined) {
          return { status: 'version_mismatch', accountNumber: props.number.value }
        }
        if (this.idsByNumber.has(props.number.value)) {
          return { status: 'duplicate_number', accountNumber: props.number.value }
        }
        continue
      }

      if (current?.version !== expectedVersion) {
        return { status: 'version_mismatch', accountNumber: props.number.value }
      }
    }
    return { status: 'ok' }
  }

  /**
   * Write staged rows and entries. Callers run `check` first, with no await
   * in between, so the pair is atomic.
   */
  apply(staged: Iterable<StagedAccount>, entries: Iterable<StoredEntry>): void {
    for (const { props } of staged) {
      this.accounts.set(props.id, { ...props })
      this.idsByNumber.set(props.number.value, props.id)
    }
    for (const entry of entries) {
      this.entries.push(entry)
    }
  }

  get accountCount(): number {
    return this.accounts.size
  }

  get entryCount(): number {
    return this.entries.length
  }
}

export type { StoredEntry }
