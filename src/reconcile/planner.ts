import type { Logger } from "pino"

import type {
  MigrationOperation,
  ObservedColumn,
  SchemaProfile,
  SchemaSnapshot,
  TableSpec,
} from "../schema/types.js"

export type PlannedStep = Readonly<{
  operation: MigrationOperation
  satisfied: boolean
}>

/**
 * Ordered planning result. Pending steps are the additive operations to run; satisfied steps
 * are tables already present with every declared column, kept so the run report can show
 * them.
 */
export type MigrationPlan = Readonly<{
  profileId: string
  steps: ReadonlyArray<PlannedStep>
}>

const findObservedColumns = (
  snapshot: SchemaSnapshot,
  tableName: string
): readonly ObservedColumn[] | undefined => {
  const exact = snapshot.get(tableName)
  if (exact) {
    return exact
  }

  const key = tableName.toLowerCase()
  for (const [name, columns] of snapshot) {
    if (name.toLowerCase() === key) {
      return columns
    }
  }

  return undefined
}

const planTable = (
  table: TableSpec,
  observed: readonly ObservedColumn[] | undefined
): PlannedStep[] => {
  if (!observed) {
    return [{ operation: { kind: "create_table", table }, satisfied: false }]
  }

  const present = new Set(observed.map((column) => column.name.toLowerCase()))
  const missing = table.columns.filter((column) => !present.has(column.name.toLowerCase()))

  if (missing.length === 0) {
    return [{ operation: { kind: "create_table", table }, satisfied: true }]
  }

  return missing.map((column) => ({
    operation: { kind: "add_column", tableName: table.name, column },
    satisfied: false,
  }))
}

/**
 * Diffs the profile against the snapshot in declaration order. Only creations and column
 * additions are ever produced; live tables and columns the profile does not mention are
 * left alone.
 */
export const planMigration = (
  profile: SchemaProfile,
  snapshot: SchemaSnapshot,
  logger?: Logger
): MigrationPlan => {
  const steps = profile.tables.flatMap((table) =>
    planTable(table, findObservedColumns(snapshot, table.name))
  )

  logger?.debug(
    {
      profileId: profile.id,
      pending: steps.filter((step) => !step.satisfied).length,
      satisfied: steps.filter((step) => step.satisfied).length,
    },
    "Migration plan computed"
  )

  return Object.freeze({ profileId: profile.id, steps: Object.freeze(steps) })
}

export const pendingOperations = (migrationPlan: MigrationPlan): MigrationOperation[] => {
  return migrationPlan.steps.filter((step) => !step.satisfied).map((step) => step.operation)
}

/**
 * Ordered additive operations that bring the live schema up to the profile.
 */
export const plan = (profile: SchemaProfile, snapshot: SchemaSnapshot): MigrationOperation[] => {
  return pendingOperations(planMigration(profile, snapshot))
}
