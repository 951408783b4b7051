export { createSpawnCommandRunner, type CommandRunner, type RunOptions } from "./command-runner.js"
export { ExtensionError, ProcessError, describeError, type ExtensionErrorKind } from "./errors.js"
export { createNodeFileSystem, type FileSystem, type WalkEntry } from "./file-system.js"
export {
  ExtensionManager,
  type ExtensionInstallResult,
  type ExtensionManagerDependencies,
} from "./manager.js"
export {
  EXTENSION_PREFIX,
  SUPPORTED_PROVIDER_HOST,
  canonicalizeExtensionName,
  isExtensionExecutableName,
  parseRepositoryName,
  resolveExecutableSuffix,
  toPlatformExecutableName,
} from "./naming.js"
