import type { Logger } from "pino"

import type { ParsedCommand, ReconcileCommand } from "./command.js"

export type CliStreams = {
  stdout: Pick<Console, "log">
  stderr: Pick<Console, "error">
}

type CommandHandler = (
  parsed: ParsedCommand,
  logger: Logger,
  streams: CliStreams
) => Promise<unknown>

type CommandHandlers = Record<ReconcileCommand, CommandHandler>

export const runCommand = async (
  parsed: ParsedCommand,
  logger: Logger,
  streams: CliStreams,
  handlers: CommandHandlers
): Promise<void> => {
  await handlers[parsed.command](parsed, logger, streams)
}
