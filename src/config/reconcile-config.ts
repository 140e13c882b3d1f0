import path from "node:path"
import { readFile } from "node:fs/promises"
import { z } from "zod"

import { ReconcileError } from "../errors.js"
import { DEFAULT_BACKUP_SUFFIX } from "../reconcile/backup.js"
import { DEFAULT_LOCK_STALE_MS } from "../reconcile/lock.js"
import type { LockSettings } from "../reconcile/run.js"

const reconcileConfigSchema = z
  .object({
    version: z.literal(1),
    databasePath: z.string().min(1, "databasePath must be a non-empty string").optional(),
    profile: z.string().min(1, "profile must be a non-empty string").optional(),
    profileFile: z.string().min(1, "profileFile must be a non-empty string").optional(),
    backupSuffix: z
      .string()
      .min(1, "backupSuffix must be a non-empty string")
      .default(DEFAULT_BACKUP_SUFFIX),
    lock: z
      .object({
        enabled: z.boolean().default(true),
        staleMs: z
          .number()
          .int("lock.staleMs must be an integer")
          .min(5000, "lock.staleMs must be >= 5000")
          .default(DEFAULT_LOCK_STALE_MS),
      })
      .default({}),
  })
  .strict()
  .superRefine((config, context) => {
    if (config.profile && config.profileFile) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "set either profile or profileFile, not both",
        path: ["profileFile"],
      })
    }
  })

export type ReconcileConfig = z.infer<typeof reconcileConfigSchema>

export type ResolvedReconcileConfig = {
  config: ReconcileConfig
  configPath: string
  found: boolean
}

export type ProfileSelection =
  | {
      kind: "builtin"
      id: string
    }
  | {
      kind: "file"
      path: string
    }

export type RunSettings = {
  databasePath: string
  profile: ProfileSelection | null
  backupSuffix: string
  lock: LockSettings
}

export type CliOverrides = {
  databasePath?: string
  profile?: string
  profileFile?: string
  lock?: boolean
}

export const CONFIG_FILE_NAME = "schema-reconcile.json"
export const DEFAULT_DATABASE_FILE = "database.db"

/**
 * Config location: explicit path, then `SCHEMA_RECONCILE_CONFIG`, then the working directory.
 */
export const resolveReconcileConfigPath = (
  explicitPath?: string,
  environment: NodeJS.ProcessEnv = process.env,
  workingDirectory = process.cwd()
): string => {
  const candidate = explicitPath ?? environment.SCHEMA_RECONCILE_CONFIG
  if (candidate) {
    return path.resolve(workingDirectory, candidate)
  }

  return path.join(workingDirectory, CONFIG_FILE_NAME)
}

export const buildDefaultReconcileConfig = (): ReconcileConfig => {
  return reconcileConfigSchema.parse({ version: 1 })
}

/**
 * Parses and validates the contents of a config file.
 *
 * @param source Raw config file contents.
 * @param configPath Path included in error messages.
 */
export const parseReconcileConfig = (source: string, configPath: string): ReconcileConfig => {
  let parsed: unknown

  try {
    parsed = JSON.parse(source)
  } catch {
    throw new ReconcileError("config_invalid", `Invalid JSON in reconcile config: ${configPath}`)
  }

  const validated = reconcileConfigSchema.safeParse(parsed)

  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new ReconcileError(
      "config_invalid",
      `Invalid reconcile config in ${configPath}: ${detail}`
    )
  }

  return validated.data
}

/**
 * Reads the config file when present. A missing file is not an error: every setting has a
 * default or can come from the command line.
 *
 * @param configPath Absolute path of the config file.
 */
export const loadReconcileConfig = async (
  configPath: string
): Promise<ResolvedReconcileConfig> => {
  let source: string

  try {
    source = await readFile(configPath, "utf8")
  } catch (error) {
    const err = error as NodeJS.ErrnoException

    if (err.code !== "ENOENT") {
      throw error
    }

    return { config: buildDefaultReconcileConfig(), configPath, found: false }
  }

  return { config: parseReconcileConfig(source, configPath), configPath, found: true }
}

/**
 * Merges command line, environment and config file into the settings of one run.
 * Precedence: command line, environment, config file, default. Paths from the config file
 * are relative to the file's directory; all others to the working directory.
 */
export const resolveRunSettings = (
  resolved: ResolvedReconcileConfig,
  overrides: CliOverrides = {},
  environment: NodeJS.ProcessEnv = process.env,
  workingDirectory = process.cwd()
): RunSettings => {
  const { config, configPath } = resolved
  const configDirectory = path.dirname(configPath)

  const requestedPath = overrides.databasePath ?? environment.SCHEMA_RECONCILE_DB
  const databasePath = requestedPath
    ? path.resolve(workingDirectory, requestedPath)
    : path.resolve(configDirectory, config.databasePath ?? DEFAULT_DATABASE_FILE)

  return {
    databasePath,
    profile: resolveProfileSelection(
      config,
      configDirectory,
      overrides,
      environment,
      workingDirectory
    ),
    backupSuffix: config.backupSuffix,
    lock: {
      enabled: overrides.lock ?? config.lock.enabled,
      staleMs: config.lock.staleMs,
    },
  }
}

const resolveProfileSelection = (
  config: ReconcileConfig,
  configDirectory: string,
  overrides: CliOverrides,
  environment: NodeJS.ProcessEnv,
  workingDirectory: string
): ProfileSelection | null => {
  if (overrides.profileFile) {
    return { kind: "file", path: path.resolve(workingDirectory, overrides.profileFile) }
  }

  const profileId = overrides.profile ?? environment.SCHEMA_RECONCILE_PROFILE
  if (profileId) {
    return { kind: "builtin", id: profileId }
  }

  if (config.profileFile) {
    return { kind: "file", path: path.resolve(configDirectory, config.profileFile) }
  }

  if (config.profile) {
    return { kind: "builtin", id: config.profile }
  }

  return null
}
