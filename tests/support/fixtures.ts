import { vi, type Mock } from 'vitest'
import { InMemoryDatabase } from '../../src/adapters/memory/in-memory-database.js'
import { InMemoryUnitOfWorkFactory } from '../../src/adapters/memory/in-memory-unit-of-work.js'
import type { UnitOfWorkFactory } from '../../src/core/ports/unit-of-work.js'
import { createRootLogger, type Logger } from '../../src/logging/logger.js'

export interface LogLine {
  level: number
  msg: string
  [field: string]: unknown
}

/**
 * A logger that keeps every line it writes, parsed.
 */
export function captureLogs(): { logger: Logger; lines: LogLine[]; messages: () => string[] } {
  const lines: LogLine[] = []
  const logger = createRootLogger(
    { nodeEnv: 'test', logLevel: 'info', serviceName: 'test' },
    {
      write(line: string) {
        lines.push(JSON.parse(line))
      }
    }
  )
  return { logger, lines, messages: () => lines.map(line => line.msg) }
}

export function createMemoryStore(options: { lockTimeoutMs?: number; rowLocking?: boolean } = {}): {
  database: InMemoryDatabase
  unitOfWork: InMemoryUnitOfWorkFactory
} {
  const database = new InMemoryDatabase()
  const unitOfWork = new InMemoryUnitOfWorkFactory({ database, ...options })
  return { database, unitOfWork }
}

/**
 * Counts calls to `begin` on a real factory.
 */
export function spyOnBegin(
  factory: UnitOfWorkFactory
): UnitOfWorkFactory & { begin: Mock<() => ReturnType<UnitOfWorkFactory['begin']>> } {
  return { begin: vi.fn(() => factory.begin()) }
}
