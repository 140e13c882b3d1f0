import type { Logger } from "pino"

import type { CliStreams } from "../cli/runner.js"
import type { ParsedCommand } from "../cli/command.js"
import {
  loadReconcileConfig,
  resolveReconcileConfigPath,
  resolveRunSettings,
  type ProfileSelection,
  type RunSettings,
} from "../config/reconcile-config.js"
import { ReconcileError } from "../errors.js"
import { renderMigrationPlan, renderRunReport } from "../reconcile/reporter.js"
import { planSchema, reconcileSchema, type DryRunResult, type RunResult } from "../reconcile/run.js"
import {
  getBuiltInProfile,
  loadBuiltInProfiles,
  loadProfileFile,
  resolveProfileDirectory,
  summarizeProfile,
  type ProfileSummary,
} from "../schema/profiles.js"
import type { SchemaProfile } from "../schema/types.js"

export type RuntimeEnvironment = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  profileDirectory?: string
}

/**
 * Turns the operator's explicit choice into a validated profile. No choice is an error that
 * lists what could have been chosen.
 */
export const loadSelectedProfile = (
  selection: ProfileSelection | null,
  profileDirectory = resolveProfileDirectory()
): SchemaProfile => {
  if (selection === null) {
    const available = loadBuiltInProfiles(profileDirectory)
      .map((profile) => profile.id)
      .join(", ")
    throw new ReconcileError(
      "profile_not_found",
      "No schema profile selected. Pass --profile <id> or --profile-file <path>. " +
        `Available profiles: ${available}`
    )
  }

  if (selection.kind === "file") {
    return loadProfileFile(selection.path)
  }

  return getBuiltInProfile(selection.id, profileDirectory)
}

const resolveSettings = async (
  parsed: ParsedCommand,
  environment: RuntimeEnvironment
): Promise<RunSettings> => {
  const env = environment.env ?? process.env
  const cwd = environment.cwd ?? process.cwd()
  const configPath = resolveReconcileConfigPath(parsed.configPath, env, cwd)
  const resolved = await loadReconcileConfig(configPath)

  return resolveRunSettings(
    resolved,
    {
      databasePath: parsed.databasePath,
      profile: parsed.profile,
      profileFile: parsed.profileFile,
      lock: parsed.lock ? undefined : false,
    },
    env,
    cwd
  )
}

/**
 * Runs one full reconciliation and prints its report. Returns normally whenever the run
 * reaches `done`, including runs with failed operations.
 */
export const runReconcile = async (
  parsed: ParsedCommand,
  logger: Logger,
  streams: CliStreams,
  environment: RuntimeEnvironment = {}
): Promise<RunResult> => {
  const settings = await resolveSettings(parsed, environment)
  const profile = loadSelectedProfile(settings.profile, environment.profileDirectory)

  const result = reconcileSchema({
    databasePath: settings.databasePath,
    profile,
    logger,
    backupSuffix: settings.backupSuffix,
    lock: settings.lock,
  })

  if (result.backup.status === "created") {
    streams.stdout.log(`backup    ${result.backup.record.backupPath}`)
  }

  for (const line of renderRunReport(result.report)) {
    streams.stdout.log(line)
  }

  if (result.summary.failed > 0) {
    for (const failure of result.summary.failures) {
      streams.stderr.error(`${failure.operation}: ${failure.reason}`)
    }
  }

  return result
}

export const runPlan = async (
  parsed: ParsedCommand,
  logger: Logger,
  streams: CliStreams,
  environment: RuntimeEnvironment = {}
): Promise<DryRunResult> => {
  const settings = await resolveSettings(parsed, environment)
  const profile = loadSelectedProfile(settings.profile, environment.profileDirectory)
  const result = planSchema(settings.databasePath, profile, logger)

  for (const line of renderMigrationPlan(result.plan)) {
    streams.stdout.log(line)
  }

  return result
}

export const runListProfiles = async (
  _parsed: ParsedCommand,
  _logger: Logger,
  streams: CliStreams,
  environment: RuntimeEnvironment = {}
): Promise<ProfileSummary[]> => {
  const summaries = loadBuiltInProfiles(environment.profileDirectory).map(summarizeProfile)

  for (const summary of summaries) {
    streams.stdout.log(
      `${summary.id} (v${summary.version}) ${summary.tableNames.join(", ")}: ${summary.description}`
    )
  }

  return summaries
}
