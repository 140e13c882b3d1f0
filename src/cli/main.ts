import { describeError, isReconcileError } from "../errors.js"
import { createComponentLogger, createLogger } from "../logging/logger.js"
import {
  runListProfiles,
  runPlan,
  runReconcile,
  type RuntimeEnvironment,
} from "../runtime/reconcile.js"
import { getAppVersion } from "../version.js"
import { parseCommand } from "./command.js"
import { runCommand, type CliStreams } from "./runner.js"

export const EXIT_OK = 0
export const EXIT_FAILURE = 1

/**
 * Runs one CLI invocation end to end and returns the process exit code. A run that reaches
 * `done` exits 0 even when operations failed; aborts and usage errors exit 1.
 *
 * @param argv User arguments, without the node binary and script path.
 */
export const runCli = async (
  argv: string[],
  streams: CliStreams,
  environment: RuntimeEnvironment = {}
): Promise<number> => {
  let logger = createLogger()

  try {
    const parsed = parseCommand(argv)
    logger = createLogger({ logLevel: parsed.logLevel })
    logger.debug({ version: getAppVersion(), command: parsed.command }, "schema-reconcile starting")

    await runCommand(parsed, createComponentLogger(parsed.command, logger), streams, {
      reconcile: (command, commandLogger, commandStreams) =>
        runReconcile(command, commandLogger, commandStreams, environment),
      plan: (command, commandLogger, commandStreams) =>
        runPlan(command, commandLogger, commandStreams, environment),
      profiles: (command, commandLogger, commandStreams) =>
        runListProfiles(command, commandLogger, commandStreams, environment),
    })

    return EXIT_OK
  } catch (error) {
    const code = isReconcileError(error) ? error.code : "unexpected"
    logger.error({ code, error: describeError(error) }, "schema-reconcile failed")
    streams.stderr.error(`schema-reconcile: ${describeError(error)}`)
    return EXIT_FAILURE
  }
}
