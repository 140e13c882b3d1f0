export type ReconcileErrorCode =
  | "backup_failed"
  | "inspection_failed"
  | "lock_failed"
  | "profile_invalid"
  | "profile_not_found"
  | "config_invalid"

export type RunState = "idle" | "backing_up" | "planning" | "executing" | "done" | "aborted"

type ReconcileErrorOptions = {
  cause?: unknown
  transitions?: RunState[]
}

/**
 * Raised for conditions that stop a run before or instead of mutating the database.
 * Per-operation failures never surface through this class; they are report data.
 */
export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode
  readonly transitions: RunState[]

  constructor(code: ReconcileErrorCode, message: string, options: ReconcileErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "ReconcileError"
    this.code = code
    this.transitions = options.transitions ?? []
  }

  get state(): RunState | null {
    return this.transitions.at(-1) ?? null
  }
}

export const isReconcileError = (error: unknown): error is ReconcileError => {
  return error instanceof ReconcileError
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }

  return String(error)
}
