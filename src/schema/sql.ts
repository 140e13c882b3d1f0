import {
  SURROGATE_KEY_COLUMN,
  type ColumnSpec,
  type DefaultValue,
  type TableSpec,
  type TimeExpression,
} from "./types.js"

export const quoteIdentifier = (identifier: string): string => {
  return `"${identifier.replaceAll('"', '""')}"`
}

export const renderLiteral = (value: string | number | null): string => {
  if (value === null) {
    return "NULL"
  }

  if (typeof value === "number") {
    return String(value)
  }

  return `'${value.replaceAll("'", "''")}'`
}

const isTimeExpression = (
  value: DefaultValue | undefined
): value is { expression: TimeExpression } => {
  return typeof value === "object" && value !== null
}

const renderDefault = (value: DefaultValue): string => {
  if (isTimeExpression(value)) {
    return value.expression
  }

  return renderLiteral(value)
}

const renderCheck = (column: ColumnSpec): string | null => {
  if (!column.allowedValues) {
    return null
  }

  const values = column.allowedValues.map((value) => renderLiteral(value)).join(", ")
  return `CHECK (${quoteIdentifier(column.name)} IN (${values}))`
}

const renderReference = (column: ColumnSpec): string | null => {
  if (!column.foreignKey) {
    return null
  }

  const targetColumn = column.foreignKey.column ?? SURROGATE_KEY_COLUMN
  return `REFERENCES ${quoteIdentifier(column.foreignKey.table)} (${quoteIdentifier(targetColumn)})`
}

/**
 * Column definition for CREATE TABLE. Foreign keys are rendered as table constraints instead.
 */
export const renderColumnDefinition = (column: ColumnSpec, isPrimaryKey = false): string => {
  const parts = [quoteIdentifier(column.name), column.sqlType]

  if (isPrimaryKey) {
    parts.push("PRIMARY KEY")
  }

  if (!column.nullable && !isPrimaryKey) {
    parts.push("NOT NULL")
  }

  if (column.uniqueConstraint && !isPrimaryKey) {
    parts.push("UNIQUE")
  }

  if (column.defaultValue !== undefined) {
    parts.push(`DEFAULT ${renderDefault(column.defaultValue)}`)
  }

  const check = renderCheck(column)
  if (check) {
    parts.push(check)
  }

  return parts.join(" ")
}

/**
 * Full CREATE TABLE statement in declaration order. Tables without a declared primary key
 * get an auto-incrementing surrogate `id` as their first column.
 */
export const renderCreateTable = (table: TableSpec): string => {
  const lines: string[] = []

  if (table.primaryKey === undefined) {
    lines.push(`${quoteIdentifier(SURROGATE_KEY_COLUMN)} INTEGER PRIMARY KEY AUTOINCREMENT`)
  }

  for (const column of table.columns) {
    const isPrimaryKey = column.name.toLowerCase() === table.primaryKey?.toLowerCase()
    lines.push(renderColumnDefinition(column, isPrimaryKey))
  }

  for (const column of table.columns) {
    if (!column.foreignKey) {
      continue
    }

    const targetColumn = column.foreignKey.column ?? SURROGATE_KEY_COLUMN
    lines.push(
      `FOREIGN KEY (${quoteIdentifier(column.name)}) REFERENCES ${quoteIdentifier(
        column.foreignKey.table
      )} (${quoteIdentifier(targetColumn)})`
    )
  }

  return `CREATE TABLE ${quoteIdentifier(table.name)} (\n  ${lines.join(",\n  ")}\n)`
}

export const uniqueIndexName = (tableName: string, columnName: string): string => {
  return `${tableName}_${columnName}_unique`
}

/**
 * Statements that add one column to an existing table. SQLite's ADD COLUMN refuses UNIQUE,
 * NOT NULL without a constant default, and time-expression defaults, so those parts are
 * reshaped: uniqueness moves to a companion index, the others are left out.
 *
 * @returns The ALTER TABLE statement, followed by the unique index statement when needed.
 */
export const renderAddColumn = (tableName: string, column: ColumnSpec): string[] => {
  const parts = [quoteIdentifier(column.name), column.sqlType]
  const constantDefault =
    column.defaultValue !== undefined && !isTimeExpression(column.defaultValue)
      ? column.defaultValue
      : undefined

  if (!column.nullable && constantDefault !== undefined && constantDefault !== null) {
    parts.push("NOT NULL")
  }

  if (constantDefault !== undefined) {
    parts.push(`DEFAULT ${renderLiteral(constantDefault)}`)
  }

  const check = renderCheck(column)
  if (check) {
    parts.push(check)
  }

  const reference = renderReference(column)
  if (reference) {
    parts.push(reference)
  }

  const statements = [`ALTER TABLE ${quoteIdentifier(tableName)} ADD COLUMN ${parts.join(" ")}`]

  if (column.uniqueConstraint) {
    statements.push(
      `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdentifier(
        uniqueIndexName(tableName, column.name)
      )} ON ${quoteIdentifier(tableName)} (${quoteIdentifier(column.name)})`
    )
  }

  return statements
}
