import lockfile from "proper-lockfile"
import type { Logger } from "pino"

import { ReconcileError, describeError } from "../errors.js"

export const DEFAULT_LOCK_STALE_MS = 60_000

export type LockOptions = {
  staleMs?: number
  logger?: Logger
}

export type ReleaseLock = () => void

export const resolveLockPath = (databasePath: string): string => {
  return `${databasePath}.lock`
}

/**
 * Takes the run's exclusive lock beside the database file. The database itself may not exist
 * yet, so the lock never resolves the real path of its target.
 *
 * @throws ReconcileError with code `lock_failed` when another run holds the lock.
 */
export const acquireRunLock = (databasePath: string, options: LockOptions = {}): ReleaseLock => {
  const { staleMs = DEFAULT_LOCK_STALE_MS, logger } = options
  const lockfilePath = resolveLockPath(databasePath)

  let release: () => void
  try {
    release = lockfile.lockSync(databasePath, {
      lockfilePath,
      realpath: false,
      stale: staleMs,
      onCompromised: (error) => {
        logger?.warn({ lockfilePath, error: describeError(error) }, "Run lock compromised")
      },
    })
  } catch (error) {
    throw new ReconcileError(
      "lock_failed",
      `Cannot lock ${databasePath} (${lockfilePath}): ${describeError(error)}`,
      { cause: error }
    )
  }

  logger?.debug({ lockfilePath }, "Run lock acquired")

  return () => {
    release()
    logger?.debug({ lockfilePath }, "Run lock released")
  }
}
