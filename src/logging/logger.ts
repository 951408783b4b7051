import pino, { type Logger } from "pino"

import {
  buildLoggerOptions,
  resolveLogLevel,
  resolveRuntimeEnv,
  type RuntimeEnv,
} from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
}

/**
 * Creates logger instances from one shared policy surface so every command emits the same
 * metadata and formatting.
 *
 * @param input Optional logger overrides for embedding and tests.
 * @returns Configured Pino logger writing to stderr.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const prettyLogs = input.prettyLogs ?? process.env.JUST_PRETTY_LOGS === "1"
  const options = buildLoggerOptions({
    env,
    logLevel: input.logLevel ?? resolveLogLevel(process.env.JUST_LOG_LEVEL),
    serviceName: input.serviceName,
    prettyLogs,
  })

  if (options.transport) {
    return pino(options)
  }

  return pino(options, pino.destination(2))
}

export const logger = createLogger()

/**
 * Scopes records to one logical component, e.g. `install` or `manager`.
 *
 * @param component Logical component name attached to each record.
 * @param parent Parent logger used to inherit base fields.
 * @returns Component-scoped logger.
 */
export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component })
}
