import pino, { type LoggerOptions, type TransportSingleOptions } from "pino"

export type RuntimeEnv = "development" | "test" | "production"

type BuildLoggerOptionsInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
}

export const DEFAULT_SERVICE_NAME = "schema-reconcile"

const STDERR_FD = 2

const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    singleLine: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
    destination: STDERR_FD,
  },
}

/**
 * Maps NODE_ENV onto the three runtime environments; anything unrecognised is development.
 *
 * @param value Optional environment value, defaulting to NODE_ENV.
 */
export const resolveRuntimeEnv = (value = process.env.NODE_ENV): RuntimeEnv => {
  if (value === "production") {
    return "production"
  }

  if (value === "test") {
    return "test"
  }

  return "development"
}

/**
 * Logger option policy shared by the CLI and embedders. Pretty output is opt-in and only
 * honoured outside production.
 */
export const buildLoggerOptions = ({
  env = resolveRuntimeEnv(),
  logLevel,
  serviceName = DEFAULT_SERVICE_NAME,
  prettyLogs = false,
}: BuildLoggerOptionsInput = {}): LoggerOptions => {
  const level = logLevel ?? (env === "development" ? "debug" : "info")
  const shouldUsePrettyTransport = env === "development" && prettyLogs

  return {
    name: serviceName,
    level,
    base: {
      service: serviceName,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: shouldUsePrettyTransport ? PRETTY_TRANSPORT : undefined,
  }
}
