import { describe, it, expect, vi, afterEach } from 'vitest'
import { LockTable } from '../../../src/adapters/memory/lock-table.js'

const wait = { timeoutMs: 1000, mode: 'wait' } as const
const nowait = { timeoutMs: 1000, mode: 'nowait' } as const

describe('LockTable', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should grant a free lock immediately', async () => {
    const locks = new LockTable()
    const owner = Symbol('a')

    expect((await locks.acquire('100000', owner, wait)).isOk()).toBe(true)
    expect(locks.holderOf('100000')).toBe(owner)
  })

  it('should be reentrant for the holder', async () => {
    const locks = new LockTable()
    const owner = Symbol('a')

    await locks.acquire('100000', owner, wait)
    expect((await locks.acquire('100000', owner, nowait)).isOk()).toBe(true)
  })

  it('should fail fast in nowait mode', async () => {
    const locks = new LockTable()
    await locks.acquire('100000', Symbol('a'), wait)

    const result = await locks.acquire('100000', Symbol('b'), nowait)

    expect(result._unsafeUnwrapErr().reason).toBe('lock_unavailable')
  })

  it('should hand the lock to waiters in arrival order', async () => {
    const locks = new LockTable()
    const [a, b, c] = [Symbol('a'), Symbol('b'), Symbol('c')]
    const granted: string[] = []

    await locks.acquire('100000', a, wait)
    const forB = locks.acquire('100000', b, wait).then(() => granted.push('b'))
    const forC = locks.acquire('100000', c, wait).then(() => granted.push('c'))

    locks.releaseAll(a)
    await forB
    expect(locks.holderOf('100000')).toBe(b)

    locks.releaseAll(b)
    await forC
    expect(granted).toEqual(['b', 'c'])
    expect(locks.holderOf('100000')).toBe(c)

    locks.releaseAll(c)
    expect(locks.isLocked('100000')).toBe(false)
  })

  it('should time out a waiter and forget it', async () => {
    vi.useFakeTimers()
    const locks = new LockTable()
    const [a, b] = [Symbol('a'), Symbol('b')]

    await locks.acquire('100000', a, wait)
    const pending = locks.acquire('100000', b, { timeoutMs: 50, mode: 'wait' })

    await vi.advanceTimersByTimeAsync(50)
    const result = await pending
    expect(result._unsafeUnwrapErr().reason).toBe('lock_timeout')

    locks.releaseAll(a)
    expect(locks.isLocked('100000')).toBe(false)
  })

  it('should release every key held by an owner', async () => {
    const locks = new LockTable()
    const owner = Symbol('a')

    await locks.acquire('100000', owner, wait)
    await locks.acquire('200000', owner, wait)
    locks.releaseAll(owner)

    expect(locks.isLocked('100000')).toBe(false)
    expect(locks.isLocked('200000')).toBe(false)
  })
})
