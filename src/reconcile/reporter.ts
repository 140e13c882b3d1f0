import type { RunReport } from "../schema/types.js"
import { describeOperation, renderOperation } from "./executor.js"
import { pendingOperations, type MigrationPlan } from "./planner.js"

export type OperationFailure = {
  operation: string
  reason: string
}

export type RunSummary = {
  applied: number
  alreadySatisfied: number
  failed: number
  failures: OperationFailure[]
}

const STATUS_LABELS = {
  applied: "applied",
  already_satisfied: "satisfied",
  failed: "failed",
} as const

const LABEL_WIDTH = 9

export const summarizeRunReport = (report: RunReport): RunSummary => {
  const summary: RunSummary = { applied: 0, alreadySatisfied: 0, failed: 0, failures: [] }

  for (const { operation, outcome } of report) {
    switch (outcome.status) {
      case "applied":
        summary.applied += 1
        break
      case "already_satisfied":
        summary.alreadySatisfied += 1
        break
      case "failed":
        summary.failed += 1
        summary.failures.push({ operation: describeOperation(operation), reason: outcome.reason })
        break
    }
  }

  return summary
}

/**
 * One line per report entry, then a totals line.
 */
export const renderRunReport = (report: RunReport): string[] => {
  const lines = report.map(({ operation, outcome }) => {
    const label = STATUS_LABELS[outcome.status].padEnd(LABEL_WIDTH)
    const suffix = outcome.status === "failed" ? `: ${outcome.reason}` : ""
    return `${label} ${describeOperation(operation)}${suffix}`
  })

  const summary = summarizeRunReport(report)
  lines.push(
    `applied=${summary.applied} satisfied=${summary.alreadySatisfied} failed=${summary.failed}`
  )

  return lines
}

export const renderMigrationPlan = (migrationPlan: MigrationPlan): string[] => {
  const operations = pendingOperations(migrationPlan)

  if (operations.length === 0) {
    return [`profile ${migrationPlan.profileId}: schema already satisfied`]
  }

  const lines = [`profile ${migrationPlan.profileId}: ${operations.length} pending operation(s)`]
  for (const operation of operations) {
    lines.push(`- ${describeOperation(operation)}`)
    for (const statement of renderOperation(operation)) {
      lines.push(`  ${statement.replaceAll("\n", "\n  ")};`)
    }
  }

  return lines
}
