import { Result, ResultAsync, err } from 'neverthrow'
import type { UnitOfWork, UnitOfWorkFactory } from '../ports/unit-of-work.js'
import { StorageError } from '../errors/storage-error.js'
import { getLogger, type Logger } from '../../logging/logger.js'

/**
 * Open a unit of work, run `work` inside it and always release it.
 *
 * `work` is expected to commit explicitly. If it returns an error or throws,
 * the unit is rolled back; a thrown value comes back as StorageError.
 * Releasing an uncommitted unit rolls it back as well.
 */
export function withUnitOfWork<T, E>(
  factory: UnitOfWorkFactory,
  work: (uow: UnitOfWork) => ResultAsync<T, E>,
  logger: Logger = getLogger('unit-of-work')
): ResultAsync<T, E | StorageError> {
  return factory.begin().andThen(uow => new ResultAsync(runScoped(uow, work, logger)))
}

async function runScoped<T, E>(
  uow: UnitOfWork,
  work: (uow: UnitOfWork) => ResultAsync<T, E>,
  logger: Logger
): Promise<Result<T, E | StorageError>> {
  try {
    const result = await work(uow)
    if (result.isErr()) {
      await rollbackQuietly(uow, logger)
    }
    return result
  } catch (cause) {
    await rollbackQuietly(uow, logger)
    return err(StorageError.from(cause, 'Unit of work aborted'))
  } finally {
    try {
      await uow.release()
    } catch (cause) {
      logger.error({ err: cause }, 'unit_of_work_release_failed')
    }
  }
}

// Rollback failures are logged; the work's own error is returned.
async function rollbackQuietly(uow: UnitOfWork, logger: Logger): Promise<void> {
  const rolledBack = await uow.rollback()
  if (rolledBack.isErr()) {
    logger.error({ err: rolledBack.error }, 'unit_of_work_rollback_failed')
  }
}
