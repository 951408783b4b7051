import pino, { type LoggerOptions, type TransportSingleOptions } from "pino"

export type RuntimeEnv = "development" | "test" | "production"

type BuildLoggerOptionsInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
}

const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    singleLine: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
    destination: 2,
  },
}

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
 * Accepts a level name from the environment only when pino knows it, so a typo in
 * `JUST_LOG_LEVEL` falls back to the default instead of failing logger creation.
 */
export const resolveLogLevel = (value: string | undefined): string | undefined => {
  const level = value?.trim().toLowerCase()
  if (!level) {
    return undefined
  }

  return level === "silent" || level in pino.levels.values ? level : undefined
}

/**
 * Builds pino options for the CLI. Records go to stderr so command output on stdout stays
 * pipeable.
 */
export const buildLoggerOptions = ({
  env = resolveRuntimeEnv(),
  logLevel,
  serviceName = "just-ext",
  prettyLogs = false,
}: BuildLoggerOptionsInput = {}): LoggerOptions => {
  const level = logLevel ?? (env === "development" ? "debug" : "info")

  return {
    name: serviceName,
    level,
    base: {
      service: serviceName,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: env === "development" && prettyLogs ? PRETTY_TRANSPORT : undefined,
  }
}
