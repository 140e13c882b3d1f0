import { Command, CommanderError } from "commander"
import { z } from "zod"

export const VALID_COMMANDS = ["reconcile", "plan", "profiles"] as const
export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const

export type ReconcileCommand = (typeof VALID_COMMANDS)[number]

const argumentsSchema = z.array(z.string().min(1).optional())

const optionsSchema = z.object({
  profile: z.string().min(1).optional(),
  profileFile: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  lock: z.boolean(),
})

export type ParsedCommand = {
  command: ReconcileCommand
  databasePath?: string
  profile?: string
  profileFile?: string
  configPath?: string
  logLevel?: (typeof LOG_LEVELS)[number]
  lock: boolean
}

const isValidCommand = (value: string): value is ReconcileCommand => {
  return VALID_COMMANDS.some((command) => command === value)
}

const buildParser = (): Command => {
  return new Command()
    .name("schema-reconcile")
    .exitOverride()
    .allowUnknownOption(false)
    .allowExcessArguments(false)
    .argument("[command]", `one of ${VALID_COMMANDS.join(", ")} (default: reconcile)`)
    .argument("[database]", "path to the SQLite database file")
    .option("-p, --profile <id>", "built-in schema profile to reconcile against")
    .option("--profile-file <path>", "JSON schema profile to reconcile against")
    .option("-c, --config <path>", "config file path")
    .option("--log-level <level>", `log level (${LOG_LEVELS.join(", ")})`)
    .option(
      "--no-lock",
      "do not take the run lock file (by default a lock held by another run aborts with exit 1)"
    )
}

export const formatHelp = (): string => {
  return buildParser().helpInformation()
}

/**
 * A lone positional that is not a command is the database path, so the common case needs
 * nothing but the path.
 */
const resolvePositionals = (
  positionals: Array<string | undefined>
): { command: ReconcileCommand; databasePath?: string } => {
  const [first, second] = positionals

  if (first === undefined) {
    return { command: "reconcile" }
  }

  if (isValidCommand(first)) {
    return { command: first, databasePath: second }
  }

  if (second === undefined) {
    return { command: "reconcile", databasePath: first }
  }

  throw new Error(`Unknown command: ${first}. Valid commands: ${VALID_COMMANDS.join(", ")}`)
}

/**
 * Parses CLI arguments into a supported command and validated options.
 *
 * @param argv Raw user arguments from process argv.
 * @returns Parsed command, defaulting to `reconcile` for zero-arg startup.
 */
export const parseCommand = (argv: string[]): ParsedCommand => {
  const parser = buildParser()

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new Error(error.message)
    }

    if (error instanceof Error) {
      throw error
    }

    throw new Error("Unknown command parsing error")
  }

  const { command, databasePath } = resolvePositionals(
    argumentsSchema.parse(parser.processedArgs)
  )
  const options = optionsSchema.safeParse(parser.opts())

  if (!options.success) {
    const detail = options.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid options: ${detail}`)
  }

  if (options.data.profile && options.data.profileFile) {
    throw new Error("Use either --profile or --profile-file, not both")
  }

  return {
    command,
    databasePath,
    profile: options.data.profile,
    profileFile: options.data.profileFile,
    configPath: options.data.config,
    logLevel: options.data.logLevel,
    lock: options.data.lock,
  }
}
