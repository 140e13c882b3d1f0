import type Database from "better-sqlite3"
import type { Logger } from "pino"

import { describeError } from "../errors.js"
import { renderAddColumn, renderCreateTable } from "../schema/sql.js"
import type {
  MigrationOperation,
  OperationOutcome,
  RunReport,
  RunReportEntry,
} from "../schema/types.js"
import type { MigrationPlan } from "./planner.js"

const DUPLICATE_COLUMN_PATTERN = /duplicate column name/i

export const describeOperation = (operation: MigrationOperation): string => {
  if (operation.kind === "create_table") {
    return `create table ${operation.table.name}`
  }

  return `add column ${operation.tableName}.${operation.column.name}`
}

/**
 * DDL statements for one operation, in execution order.
 */
export const renderOperation = (operation: MigrationOperation): string[] => {
  if (operation.kind === "create_table") {
    return [renderCreateTable(operation.table)]
  }

  return renderAddColumn(operation.tableName, operation.column)
}

const classifyFailure = (operation: MigrationOperation, error: unknown): OperationOutcome => {
  const reason = describeError(error)

  if (operation.kind === "add_column" && DUPLICATE_COLUMN_PATTERN.test(reason)) {
    return { status: "already_satisfied" }
  }

  return { status: "failed", reason }
}

/**
 * Runs one operation's statements in a single transaction. A companion index lands together
 * with its column or not at all.
 */
export const applyOperation = (
  database: Database.Database,
  operation: MigrationOperation
): OperationOutcome => {
  const statements = renderOperation(operation)
  const run = database.transaction(() => {
    for (const statement of statements) {
      database.exec(statement)
    }
  })

  try {
    run()
    return { status: "applied" }
  } catch (error) {
    return classifyFailure(operation, error)
  }
}

const logOutcome = (logger: Logger | undefined, entry: RunReportEntry): void => {
  if (!logger) {
    return
  }

  const description = describeOperation(entry.operation)

  if (entry.outcome.status === "failed") {
    logger.warn({ operation: description, reason: entry.outcome.reason }, "Operation failed")
    return
  }

  logger.info({ operation: description, outcome: entry.outcome.status }, "Operation completed")
}

/**
 * Applies operations strictly in the given order. A failing operation is recorded and the
 * batch continues; nothing here throws for a single statement's failure.
 *
 * @param database Open handle to the database under reconciliation.
 * @param operations Planner output, in planner order.
 */
export const execute = (
  database: Database.Database,
  operations: readonly MigrationOperation[],
  logger?: Logger
): RunReport => {
  const report: RunReportEntry[] = []

  for (const operation of operations) {
    const entry: RunReportEntry = { operation, outcome: applyOperation(database, operation) }
    logOutcome(logger, entry)
    report.push(entry)
  }

  return report
}

/**
 * Executes a full plan: satisfied steps are recorded without touching the database, pending
 * steps run in plan order.
 */
export const executePlan = (
  database: Database.Database,
  migrationPlan: MigrationPlan,
  logger?: Logger
): RunReport => {
  const report: RunReportEntry[] = []

  for (const step of migrationPlan.steps) {
    if (step.satisfied) {
      const entry: RunReportEntry = {
        operation: step.operation,
        outcome: { status: "already_satisfied" },
      }
      logOutcome(logger, entry)
      report.push(entry)
      continue
    }

    report.push(...execute(database, [step.operation], logger))
  }

  return report
}
