import { existsSync, readFileSync, readdirSync, statSync } from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

import { ReconcileError } from "../errors.js"
import {
  SURROGATE_KEY_COLUMN,
  schemaProfileSchema,
  type ColumnSpec,
  type SchemaProfile,
  type TableSpec,
} from "./types.js"

const PROFILE_DIRECTORY_NAME = "profiles"
const PROFILE_EXTENSION = ".json"

export type ProfileSummary = {
  id: string
  version: number
  description: string
  tableNames: string[]
}

const sameName = (left: string, right: string): boolean => {
  return left.toLowerCase() === right.toLowerCase()
}

export const findTable = (profile: SchemaProfile, tableName: string): TableSpec | undefined => {
  return profile.tables.find((table) => sameName(table.name, tableName))
}

export const findColumn = (table: TableSpec, columnName: string): ColumnSpec | undefined => {
  return table.columns.find((column) => sameName(column.name, columnName))
}

/**
 * Primary key column of a table: the declared one, or the auto-incrementing surrogate.
 */
export const resolvePrimaryKey = (table: TableSpec): string => {
  return table.primaryKey ?? SURROGATE_KEY_COLUMN
}

const collectDuplicates = (names: readonly string[]): string[] => {
  const seen = new Set<string>()
  const duplicates = new Set<string>()

  for (const name of names) {
    const key = name.toLowerCase()
    if (seen.has(key)) {
      duplicates.add(name)
    }
    seen.add(key)
  }

  return [...duplicates]
}

const checkStructure = (profile: SchemaProfile): string[] => {
  const issues: string[] = []

  for (const name of collectDuplicates(profile.tables.map((table) => table.name))) {
    issues.push(`tables: duplicate table name "${name}"`)
  }

  for (const table of profile.tables) {
    const scope = `tables.${table.name}`

    for (const name of collectDuplicates(table.columns.map((column) => column.name))) {
      issues.push(`${scope}: duplicate column name "${name}"`)
    }

    if (table.primaryKey !== undefined && !findColumn(table, table.primaryKey)) {
      issues.push(`${scope}: primary key "${table.primaryKey}" is not a declared column`)
    }

    if (table.primaryKey === undefined && findColumn(table, SURROGATE_KEY_COLUMN)) {
      issues.push(
        `${scope}: column "${SURROGATE_KEY_COLUMN}" clashes with the surrogate key; ` +
          "declare it as primaryKey instead"
      )
    }

    for (const column of table.columns) {
      if (!column.foreignKey) {
        continue
      }

      const reference = `${scope}.${column.name}: foreign key targets undeclared`
      const target = findTable(profile, column.foreignKey.table)
      if (!target) {
        issues.push(`${reference} table "${column.foreignKey.table}"`)
        continue
      }

      const targetColumn = column.foreignKey.column ?? resolvePrimaryKey(target)
      const declared =
        sameName(targetColumn, resolvePrimaryKey(target)) || findColumn(target, targetColumn)
      if (!declared) {
        issues.push(`${reference} column "${target.name}.${targetColumn}"`)
      }
    }
  }

  return issues
}

/**
 * Validates a raw profile document into an immutable SchemaProfile.
 *
 * @param input Parsed JSON (or in-process object) describing the profile.
 * @param source Label used in error messages, usually the file path.
 */
export const parseProfile = (input: unknown, source = "inline profile"): SchemaProfile => {
  const validated = schemaProfileSchema.safeParse(input)

  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new ReconcileError("profile_invalid", `Invalid schema profile in ${source}: ${detail}`)
  }

  const profile: SchemaProfile = validated.data
  const issues = checkStructure(profile)

  if (issues.length > 0) {
    throw new ReconcileError(
      "profile_invalid",
      `Invalid schema profile in ${source}: ${issues.join("; ")}`
    )
  }

  return deepFreeze(resolveForeignKeyTargets(profile))
}

/**
 * Fills in the target column of every foreign key that leaves it implicit, so rendered DDL
 * never depends on looking the target table up again.
 */
const resolveForeignKeyTargets = (profile: SchemaProfile): SchemaProfile => {
  const resolveColumn = (column: ColumnSpec): ColumnSpec => {
    if (!column.foreignKey || column.foreignKey.column !== undefined) {
      return column
    }

    const target = findTable(profile, column.foreignKey.table)
    return {
      ...column,
      foreignKey: {
        table: column.foreignKey.table,
        column: target ? resolvePrimaryKey(target) : SURROGATE_KEY_COLUMN,
      },
    }
  }

  return {
    ...profile,
    tables: profile.tables.map((table) => ({
      ...table,
      columns: table.columns.map(resolveColumn),
    })),
  }
}

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }

  return value
}

/**
 * Loads one profile document from disk.
 *
 * @param filePath JSON file in the profile format.
 */
export const loadProfileFile = (filePath: string): SchemaProfile => {
  let source: string

  try {
    source = readFileSync(filePath, "utf8")
  } catch (error) {
    throw new ReconcileError("profile_not_found", `Cannot read schema profile: ${filePath}`, {
      cause: error,
    })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(source)
  } catch (error) {
    throw new ReconcileError("profile_invalid", `Invalid JSON in schema profile: ${filePath}`, {
      cause: error,
    })
  }

  return parseProfile(parsed, filePath)
}

/**
 * Finds the bundled profile directory by walking up from this module, which works from both
 * the TypeScript sources and the compiled output.
 */
export const resolveProfileDirectory = (moduleUrl = import.meta.url): string => {
  let directory = path.dirname(fileURLToPath(moduleUrl))

  for (;;) {
    const candidate = path.join(directory, PROFILE_DIRECTORY_NAME)
    if (existsSync(candidate) && statSync(candidate).isDirectory()) {
      return candidate
    }

    const parent = path.dirname(directory)
    if (parent === directory) {
      throw new ReconcileError(
        "profile_not_found",
        `No "${PROFILE_DIRECTORY_NAME}" directory found above ${moduleUrl}`
      )
    }
    directory = parent
  }
}

export const loadBuiltInProfiles = (directory = resolveProfileDirectory()): SchemaProfile[] => {
  return readdirSync(directory)
    .filter((entry) => entry.endsWith(PROFILE_EXTENSION))
    .sort((left, right) => left.localeCompare(right))
    .map((entry) => loadProfileFile(path.join(directory, entry)))
}

export const summarizeProfile = (profile: SchemaProfile): ProfileSummary => {
  return {
    id: profile.id,
    version: profile.version,
    description: profile.description,
    tableNames: profile.tables.map((table) => table.name),
  }
}

/**
 * Selects one built-in profile by id. Selection is always explicit; there is no fallback.
 *
 * @param profileId Identifier chosen by the operator.
 * @param directory Profile directory override for tests and embedding.
 */
export const getBuiltInProfile = (
  profileId: string,
  directory = resolveProfileDirectory()
): SchemaProfile => {
  const profiles = loadBuiltInProfiles(directory)
  const match = profiles.find((profile) => profile.id === profileId)

  if (!match) {
    const available = profiles.map((profile) => profile.id).join(", ")
    throw new ReconcileError(
      "profile_not_found",
      `Unknown schema profile: ${profileId}. Available profiles: ${available}`
    )
  }

  return match
}
