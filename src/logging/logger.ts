import pino, { type Logger } from "pino"

import { buildLoggerOptions, resolveRuntimeEnv, type RuntimeEnv } from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
}

/**
 * Builds the process logger from `buildLoggerOptions` and the `SCHEMA_RECONCILE_*` logging
 * variables. Records go to stderr; stdout carries the report.
 *
 * @param input Optional logger overrides for embedding and tests.
 * @returns Configured Pino logger.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const prettyLogs = input.prettyLogs ?? process.env.SCHEMA_RECONCILE_PRETTY_LOGS === "1"
  const options = buildLoggerOptions({
    env,
    logLevel: input.logLevel ?? process.env.SCHEMA_RECONCILE_LOG_LEVEL,
    serviceName: input.serviceName,
    prettyLogs,
  })

  if (options.transport) {
    return pino(options)
  }

  return pino(options, pino.destination(2))
}

/**
 * Scopes a logger to one engine component so every line carries its origin.
 *
 * @param component Logical component name attached to each record.
 * @param parent Parent logger used to inherit base runtime fields.
 */
export const createComponentLogger = (component: string, parent: Logger): Logger => {
  return parent.child({ component })
}
