import { existsSync } from "node:fs"

import Database from "better-sqlite3"
import type { Logger } from "pino"

import { ReconcileError, describeError, isReconcileError, type RunState } from "../errors.js"
import { createComponentLogger } from "../logging/logger.js"
import type { RunReport, SchemaProfile, SchemaSnapshot } from "../schema/types.js"
import { createBackup, type BackupOutcome } from "./backup.js"
import { executePlan } from "./executor.js"
import { inspect } from "./inspector.js"
import { acquireRunLock, type ReleaseLock } from "./lock.js"
import { planMigration, type MigrationPlan } from "./planner.js"
import { summarizeRunReport, type RunSummary } from "./reporter.js"

const ALLOWED_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ["backing_up", "aborted"],
  backing_up: ["planning", "aborted"],
  planning: ["executing", "aborted"],
  executing: ["done"],
  done: [],
  aborted: [],
}

export type LockSettings = {
  enabled: boolean
  staleMs?: number
}

export type ReconcileOptions = {
  databasePath: string
  profile: SchemaProfile
  logger: Logger
  backupSuffix?: string
  lock?: LockSettings
  now?: () => Date
}

export type RunResult = {
  state: "done"
  transitions: RunState[]
  backup: BackupOutcome
  plan: MigrationPlan
  report: RunReport
  summary: RunSummary
}

export type DryRunResult = {
  snapshot: SchemaSnapshot
  plan: MigrationPlan
}

/**
 * Tracks the run's lifecycle and rejects transitions the lifecycle does not allow.
 */
export class RunStateMachine {
  private readonly history: RunState[] = ["idle"]

  constructor(private readonly logger?: Logger) {}

  get current(): RunState {
    return this.history[this.history.length - 1] ?? "idle"
  }

  get transitions(): RunState[] {
    return [...this.history]
  }

  transition(next: RunState): void {
    const allowed = ALLOWED_TRANSITIONS[this.current]
    if (!allowed.includes(next)) {
      throw new Error(`Invalid run state transition: ${this.current} -> ${next}`)
    }

    this.history.push(next)
    this.logger?.debug({ state: next }, "Run state changed")
  }
}

const openDatabase = (databasePath: string): Database.Database => {
  try {
    return new Database(databasePath)
  } catch (error) {
    throw new ReconcileError(
      "inspection_failed",
      `Cannot open database ${databasePath}: ${describeError(error)}`,
      { cause: error }
    )
  }
}

/**
 * Brings the database at `databasePath` up to `profile` in one bounded pass:
 * lock, back up, inspect, plan, execute. Only the lock, the backup and the inspection can
 * abort a run; failed operations are reported and the run still ends in `done`.
 *
 * The caller must guarantee that no other writer uses the database during the run. The
 * lock file only excludes other reconciliation runs.
 *
 * @throws ReconcileError carrying the state history that ended in `aborted`.
 */
export const reconcileSchema = (options: ReconcileOptions): RunResult => {
  const { databasePath, profile, backupSuffix, now } = options
  const logger = createComponentLogger("reconcile", options.logger)
  const machine = new RunStateMachine(logger)

  let releaseLock: ReleaseLock | null = null
  let database: Database.Database | null = null

  const abort = (error: unknown): never => {
    machine.transition("aborted")
    const reconcileError = isReconcileError(error)
      ? new ReconcileError(error.code, error.message, {
          cause: error.cause,
          transitions: machine.transitions,
        })
      : new ReconcileError("inspection_failed", describeError(error), {
          cause: error,
          transitions: machine.transitions,
        })

    logger.error(
      { code: reconcileError.code, error: reconcileError.message, profileId: profile.id },
      "Schema reconciliation aborted"
    )
    throw reconcileError
  }

  try {
    logger.info({ databasePath, profileId: profile.id, version: profile.version }, "Run started")

    if (options.lock?.enabled ?? true) {
      try {
        releaseLock = acquireRunLock(databasePath, {
          staleMs: options.lock?.staleMs,
          logger: createComponentLogger("lock", options.logger),
        })
      } catch (error) {
        return abort(error)
      }
    }

    machine.transition("backing_up")
    let backup: BackupOutcome
    try {
      backup = createBackup(databasePath, {
        suffix: backupSuffix,
        now,
        logger: createComponentLogger("backup", options.logger),
      })
    } catch (error) {
      return abort(error)
    }

    machine.transition("planning")
    let migrationPlan: MigrationPlan
    try {
      database = openDatabase(databasePath)
      const snapshot = inspect(
        database,
        profile,
        createComponentLogger("inspector", options.logger)
      )
      migrationPlan = planMigration(
        profile,
        snapshot,
        createComponentLogger("planner", options.logger)
      )
    } catch (error) {
      return abort(error)
    }

    machine.transition("executing")
    const report = executePlan(
      database,
      migrationPlan,
      createComponentLogger("executor", options.logger)
    )
    machine.transition("done")

    const summary = summarizeRunReport(report)
    logger.info(
      {
        profileId: profile.id,
        applied: summary.applied,
        alreadySatisfied: summary.alreadySatisfied,
        failed: summary.failed,
      },
      "Schema reconciliation completed"
    )

    return {
      state: "done",
      transitions: machine.transitions,
      backup,
      plan: migrationPlan,
      report,
      summary,
    }
  } finally {
    database?.close()
    releaseLock?.()
  }
}

/**
 * Inspects and plans without backup, lock or mutation. A missing database file plans as
 * empty and is not created.
 */
export const planSchema = (
  databasePath: string,
  profile: SchemaProfile,
  logger?: Logger
): DryRunResult => {
  if (!existsSync(databasePath)) {
    const snapshot: SchemaSnapshot = new Map()
    return { snapshot, plan: planMigration(profile, snapshot, logger) }
  }

  let database: Database.Database
  try {
    database = new Database(databasePath, { readonly: true, fileMustExist: true })
  } catch (error) {
    throw new ReconcileError(
      "inspection_failed",
      `Cannot open database ${databasePath}: ${describeError(error)}`,
      { cause: error }
    )
  }

  try {
    const snapshot = inspect(database, profile, logger)
    return { snapshot, plan: planMigration(profile, snapshot, logger) }
  } finally {
    database.close()
  }
}
