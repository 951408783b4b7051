import type { Logger } from "pino"

import {
  canonicalizeExtensionName,
  describeError,
  type ExtensionManager,
} from "../extensions/index.js"
import { parseCommand, renderUsage, type ExtensionCommand } from "./command.js"

export type CliStreams = {
  stdout: Pick<Console, "log">
  stderr: Pick<Console, "error">
}

export type ManagerSurface = Pick<
  ExtensionManager,
  "resolvePath" | "locate" | "list" | "install" | "uninstall"
>

export type CliDependencies = {
  createManager: () => Promise<ManagerSurface>
  logger: Logger
  streams?: CliStreams
}

const executeCommand = async (
  command: Exclude<ExtensionCommand, { name: "help" }>,
  manager: ManagerSurface,
  stdout: CliStreams["stdout"],
  stderr: CliStreams["stderr"]
): Promise<number> => {
  switch (command.name) {
    case "list": {
      const names = [...(await manager.list())].sort((left, right) => left.localeCompare(right))
      if (names.length === 0) {
        stdout.log("(none)")
        return 0
      }

      for (const name of names) {
        stdout.log(name)
      }
      return 0
    }
    case "install": {
      const result = await manager.install(command.url)
      const name = canonicalizeExtensionName(result.repository)
      stdout.log(`Installed ${name} to ${result.binaryPath}`)
      return 0
    }
    case "uninstall": {
      const name = canonicalizeExtensionName(command.extension)
      const removed = await manager.uninstall(command.extension)
      stdout.log(removed ? `Uninstalled ${name}` : `${name} is not installed`)
      return 0
    }
    case "which": {
      const located = await manager.locate(command.extension)
      if (!located) {
        stderr.error(`${canonicalizeExtensionName(command.extension)} is not installed`)
        return 1
      }

      stdout.log(located)
      return 0
    }
    case "path":
      stdout.log(manager.resolvePath(command.extension))
      return 0
  }
}

/**
 * Parses arguments and runs one extension command. Every failure is printed to stderr and
 * turned into exit code 1.
 *
 * @param argv Raw user arguments.
 * @param dependencies Manager factory, logger and output streams.
 * @returns Process exit code.
 */
export const runCli = async (argv: string[], dependencies: CliDependencies): Promise<number> => {
  const { stdout, stderr } = dependencies.streams ?? { stdout: console, stderr: console }

  try {
    const command = parseCommand(argv)
    const commandLogger = dependencies.logger.child({ command: command.name })
    commandLogger.debug("Running command")

    if (command.name === "help") {
      stdout.log(renderUsage())
      return 0
    }

    const manager = await dependencies.createManager()
    return await executeCommand(command, manager, stdout, stderr)
  } catch (error) {
    const message = describeError(error)
    dependencies.logger.error({ error: message }, "Extension command failed")
    stderr.error(message)
    return 1
  }
}
