import type Database from "better-sqlite3"
import type { Logger } from "pino"

import { ReconcileError, describeError } from "../errors.js"
import type { ObservedColumn, SchemaProfile, SchemaSnapshot } from "../schema/types.js"

type TableInfoRow = {
  cid: number
  name: string
  type: string
  notnull: number
  dflt_value: string | null
  pk: number
}

type MasterRow = {
  name: string
}

const toObservedColumn = (row: TableInfoRow): ObservedColumn => {
  return Object.freeze({
    name: row.name,
    declaredType: row.type,
    notNull: row.notnull === 1,
    defaultValue: row.dflt_value,
    primaryKey: row.pk > 0,
  })
}

/**
 * Lists user tables in the live database, excluding SQLite's internal bookkeeping tables.
 */
export const listLiveTables = (database: Database.Database): string[] => {
  const rows = database
    .prepare(
      `SELECT name
       FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
       ORDER BY name ASC`
    )
    .all() as MasterRow[]

  return rows.map((row) => row.name)
}

const findLiveTable = (database: Database.Database, tableName: string): string | null => {
  const row = database
    .prepare(
      `SELECT name
       FROM sqlite_master
       WHERE type = 'table' AND lower(name) = lower(?)`
    )
    .get(tableName) as MasterRow | undefined

  return row?.name ?? null
}

const readColumns = (database: Database.Database, liveName: string): ObservedColumn[] => {
  const rows = database
    .prepare("SELECT * FROM pragma_table_info(?) ORDER BY cid ASC")
    .all(liveName) as TableInfoRow[]

  return rows.map(toObservedColumn)
}

/**
 * Reads live table and column metadata without mutating anything. Tables that do not exist
 * are simply absent from the snapshot; an empty database yields an empty snapshot.
 *
 * @param database Open handle to the database under reconciliation.
 * @param tableNames Tables to look up; defaults to every user table in the database.
 * @throws ReconcileError with code `inspection_failed` when metadata cannot be read.
 */
export const inspectSchema = (
  database: Database.Database,
  tableNames?: readonly string[],
  logger?: Logger
): SchemaSnapshot => {
  try {
    const snapshot = new Map<string, readonly ObservedColumn[]>()
    const requested = tableNames ?? listLiveTables(database)

    for (const tableName of requested) {
      const liveName = findLiveTable(database, tableName)
      if (liveName === null) {
        continue
      }

      snapshot.set(tableName, Object.freeze(readColumns(database, liveName)))
    }

    logger?.debug(
      { requested: requested.length, present: snapshot.size },
      "Schema snapshot captured"
    )

    return snapshot
  } catch (error) {
    throw new ReconcileError(
      "inspection_failed",
      `Cannot inspect database schema: ${describeError(error)}`,
      { cause: error }
    )
  }
}

/**
 * Snapshot of exactly the tables a profile declares.
 */
export const inspect = (
  database: Database.Database,
  profile: SchemaProfile,
  logger?: Logger
): SchemaSnapshot => {
  return inspectSchema(
    database,
    profile.tables.map((table) => table.name),
    logger
  )
}
