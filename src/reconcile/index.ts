export { createBackup, resolveBackupPath, DEFAULT_BACKUP_SUFFIX } from "./backup.js"
export {
  applyOperation,
  describeOperation,
  execute,
  executePlan,
  renderOperation,
} from "./executor.js"
export { inspect, inspectSchema, listLiveTables } from "./inspector.js"
export { acquireRunLock, resolveLockPath, DEFAULT_LOCK_STALE_MS } from "./lock.js"
export { pendingOperations, plan, planMigration } from "./planner.js"
export { renderMigrationPlan, renderRunReport, summarizeRunReport } from "./reporter.js"
export { RunStateMachine, planSchema, reconcileSchema } from "./run.js"
export { ReconcileError, isReconcileError } from "../errors.js"
export {
  getBuiltInProfile,
  loadBuiltInProfiles,
  loadProfileFile,
  parseProfile,
  resolveProfileDirectory,
} from "../schema/profiles.js"
export type { BackupOptions, BackupOutcome } from "./backup.js"
export type { MigrationPlan, PlannedStep } from "./planner.js"
export type { OperationFailure, RunSummary } from "./reporter.js"
export type { DryRunResult, LockSettings, ReconcileOptions, RunResult } from "./run.js"
export type { ReconcileErrorCode, RunState } from "../errors.js"
export type {
  BackupRecord,
  ColumnSpec,
  MigrationOperation,
  ObservedColumn,
  OperationOutcome,
  RunReport,
  RunReportEntry,
  SchemaProfile,
  SchemaSnapshot,
  TableSpec,
} from "../schema/types.js"
