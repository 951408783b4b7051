#!/usr/bin/env node
import { runCli } from "./cli/runner.js"
import { applyEnvironmentOverrides, ensureExtensionConfigFile } from "./config/extension-config.js"
import {
  ExtensionManager,
  createNodeFileSystem,
  createSpawnCommandRunner,
  describeError,
} from "./extensions/index.js"
import { createComponentLogger, logger } from "./logging/logger.js"
import { resolveExtensionFolder } from "./runtime/folder.js"
import { getAppVersion } from "./version.js"

const main = async (): Promise<void> => {
  logger.debug({ version: getAppVersion() }, "just-ext starting")

  process.exitCode = await runCli(process.argv.slice(2), {
    logger: createComponentLogger("cli"),
    createManager: async () => {
      const { config, configPath, created } = await ensureExtensionConfigFile()
      if (created) {
        logger.info({ configPath }, "Created default extension config")
      }

      const folder = await resolveExtensionFolder(applyEnvironmentOverrides(config))

      return new ExtensionManager({
        folder,
        fileSystem: createNodeFileSystem(),
        commandRunner: createSpawnCommandRunner(),
        logger: createComponentLogger("manager"),
      })
    },
  })
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, "just-ext failed")
  process.exitCode = 1
})
