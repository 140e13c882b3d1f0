import { z } from "zod"

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

const identifierSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, "must be a plain SQL identifier ([A-Za-z_][A-Za-z0-9_]*)")

export const SQL_TYPES = ["TEXT", "INTEGER", "REAL"] as const
export const TIME_EXPRESSIONS = ["CURRENT_TIMESTAMP", "CURRENT_DATE", "CURRENT_TIME"] as const

export const sqlTypeSchema = z.enum(SQL_TYPES)

export const defaultValueSchema = z.union([
  z.string(),
  z.number().finite(),
  z.null(),
  z.object({ expression: z.enum(TIME_EXPRESSIONS) }).strict(),
])

export const foreignKeySchema = z
  .object({
    table: identifierSchema,
    column: identifierSchema.optional(),
  })
  .strict()

export const columnSpecSchema = z
  .object({
    name: identifierSchema,
    sqlType: sqlTypeSchema,
    nullable: z.boolean().default(true),
    defaultValue: defaultValueSchema.optional(),
    uniqueConstraint: z.boolean().default(false),
    foreignKey: foreignKeySchema.optional(),
    allowedValues: z.array(z.union([z.string(), z.number().finite()])).min(1).optional(),
  })
  .strict()

export const tableSpecSchema = z
  .object({
    name: identifierSchema,
    columns: z.array(columnSpecSchema),
    primaryKey: identifierSchema.optional(),
  })
  .strict()

export const schemaProfileSchema = z
  .object({
    id: z.string().trim().min(1),
    version: z.number().int().min(1),
    description: z.string().default(""),
    tables: z.array(tableSpecSchema).min(1),
  })
  .strict()

export type SqlType = z.infer<typeof sqlTypeSchema>
export type TimeExpression = (typeof TIME_EXPRESSIONS)[number]
export type DefaultValue = z.infer<typeof defaultValueSchema>
export type ForeignKeySpec = z.infer<typeof foreignKeySchema>

export type ColumnSpec = Readonly<{
  name: string
  sqlType: SqlType
  nullable: boolean
  defaultValue?: DefaultValue
  uniqueConstraint: boolean
  foreignKey?: Readonly<ForeignKeySpec>
  allowedValues?: ReadonlyArray<string | number>
}>

export type TableSpec = Readonly<{
  name: string
  columns: ReadonlyArray<ColumnSpec>
  primaryKey?: string
}>

/**
 * Desired end state for one deployment generation. Tables keep declaration order, which
 * drives planning order and CREATE TABLE column order.
 */
export type SchemaProfile = Readonly<{
  id: string
  version: number
  description: string
  tables: ReadonlyArray<TableSpec>
}>

export type ProfileInput = z.input<typeof schemaProfileSchema>

export const SURROGATE_KEY_COLUMN = "id"

export type ObservedColumn = Readonly<{
  name: string
  declaredType: string
  notNull: boolean
  defaultValue: string | null
  primaryKey: boolean
}>

/**
 * Live table and column metadata captured at the start of a run. Keys are the table names
 * the inspection was asked about; absent keys mean the table does not exist.
 */
export type SchemaSnapshot = ReadonlyMap<string, ReadonlyArray<ObservedColumn>>

export type CreateTableOperation = Readonly<{
  kind: "create_table"
  table: TableSpec
}>

export type AddColumnOperation = Readonly<{
  kind: "add_column"
  tableName: string
  column: ColumnSpec
}>

export type MigrationOperation = CreateTableOperation | AddColumnOperation

export type OperationOutcome =
  | { status: "applied" }
  | { status: "already_satisfied" }
  | { status: "failed"; reason: string }

export type RunReportEntry = Readonly<{
  operation: MigrationOperation
  outcome: OperationOutcome
}>

export type RunReport = ReadonlyArray<RunReportEntry>

export type BackupRecord = Readonly<{
  sourcePath: string
  backupPath: string
  timestamp: string
  sizeBytes: number
}>
