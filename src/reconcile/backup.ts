import { copyFileSync, existsSync, statSync } from "node:fs"
import type { Logger } from "pino"

import { ReconcileError, describeError } from "../errors.js"
import type { BackupRecord } from "../schema/types.js"

export const DEFAULT_BACKUP_SUFFIX = ".bak"

export type BackupOutcome =
  | {
      status: "created"
      record: BackupRecord
    }
  | {
      status: "skipped"
      sourcePath: string
      reason: "source_missing"
    }

export type BackupOptions = {
  suffix?: string
  now?: () => Date
  logger?: Logger
}

/**
 * Sibling path that holds the single retained backup generation.
 */
export const resolveBackupPath = (sourcePath: string, suffix = DEFAULT_BACKUP_SUFFIX): string => {
  return `${sourcePath}${suffix}`
}

const resolveWalPath = (sourcePath: string): string => {
  return `${sourcePath}-wal`
}

const assertNoPendingWal = (sourcePath: string): void => {
  const walPath = resolveWalPath(sourcePath)

  if (existsSync(walPath) && statSync(walPath).size > 0) {
    throw new Error(
      `${walPath} holds changes not yet checkpointed into the database file; ` +
        "close every connection or run PRAGMA wal_checkpoint(TRUNCATE) before reconciling"
    )
  }
}

/**
 * Copies the database file byte for byte before any mutation. A missing source is the
 * fresh-install case and needs no backup. A non-empty write-ahead log beside the source
 * means the file alone is not the database's content, so the backup is refused. Any failure
 * once a copy was attempted is fatal.
 *
 * @param sourcePath Database file to protect.
 * @param options Backup suffix, clock and logger overrides.
 * @throws ReconcileError with code `backup_failed` when the copy cannot be completed.
 */
export const createBackup = (sourcePath: string, options: BackupOptions = {}): BackupOutcome => {
  const { suffix = DEFAULT_BACKUP_SUFFIX, now = () => new Date(), logger } = options

  if (!existsSync(sourcePath)) {
    logger?.info({ sourcePath }, "No existing database, backup skipped")
    return { status: "skipped", sourcePath, reason: "source_missing" }
  }

  const backupPath = resolveBackupPath(sourcePath, suffix)

  try {
    assertNoPendingWal(sourcePath)
    const expectedSize = statSync(sourcePath).size
    copyFileSync(sourcePath, backupPath)
    const sizeBytes = statSync(backupPath).size

    if (sizeBytes !== expectedSize) {
      throw new Error(`backup has ${sizeBytes} bytes, source has ${expectedSize}`)
    }

    const record: BackupRecord = Object.freeze({
      sourcePath,
      backupPath,
      timestamp: now().toISOString(),
      sizeBytes,
    })

    logger?.info({ ...record }, "Database backup created")

    return { status: "created", record }
  } catch (error) {
    throw new ReconcileError(
      "backup_failed",
      `Backup of ${sourcePath} to ${backupPath} failed: ${describeError(error)}`,
      { cause: error }
    )
  }
}
