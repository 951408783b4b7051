import path from "node:path"

import type { Logger } from "pino"

import type { Folder } from "../runtime/folder.js"
import type { CommandRunner } from "./command-runner.js"
import { ExtensionError, describeError, type ExtensionErrorKind } from "./errors.js"
import type { FileSystem } from "./file-system.js"
import {
  canonicalizeExtensionName,
  isExtensionExecutableName,
  parseRepositoryName,
  toPlatformExecutableName,
} from "./naming.js"

export type ExtensionManagerDependencies = {
  folder: Pick<Folder, "binPath">
  fileSystem: FileSystem
  commandRunner: CommandRunner
  logger: Logger
  /** Directory the working copy is cloned into, defaults to `process.cwd()`. */
  resolveWorkingRoot?: () => string
  platform?: NodeJS.Platform
}

export type ExtensionInstallResult = {
  repository: string
  binaryPath: string
}

const guard = async <T>(
  kind: ExtensionErrorKind,
  message: string,
  action: () => Promise<T>
): Promise<T> => {
  try {
    return await action()
  } catch (error) {
    throw new ExtensionError(kind, `${message}: ${describeError(error)}`, error)
  }
}

/**
 * Resolves, installs, uninstalls and lists `just-*` extension binaries kept in one bin
 * directory.
 */
export class ExtensionManager {
  private readonly binPath: string
  private readonly fileSystem: FileSystem
  private readonly commandRunner: CommandRunner
  private readonly logger: Logger
  private readonly resolveWorkingRoot: () => string
  private readonly platform: NodeJS.Platform

  constructor(dependencies: ExtensionManagerDependencies) {
    this.binPath = dependencies.folder.binPath
    this.fileSystem = dependencies.fileSystem
    this.commandRunner = dependencies.commandRunner
    this.logger = dependencies.logger
    this.resolveWorkingRoot = dependencies.resolveWorkingRoot ?? (() => process.cwd())
    this.platform = dependencies.platform ?? process.platform
  }

  /**
   * Where the binary for `name` lives once installed. Does not touch disk.
   */
  resolvePath(name: string): string {
    const executableName = toPlatformExecutableName(canonicalizeExtensionName(name), this.platform)
    return path.join(this.binPath, executableName)
  }

  async locate(name: string): Promise<string | null> {
    const binaryPath = this.resolvePath(name)
    return (await this.fileSystem.exists(binaryPath)) ? binaryPath : null
  }

  async isInstalled(name: string): Promise<boolean> {
    return (await this.locate(name)) !== null
  }

  /**
   * File names of every installed extension at any depth below the bin directory, in
   * traversal order.
   */
  async list(): Promise<string[]> {
    const names: string[] = []

    for await (const entry of this.fileSystem.walk(this.binPath)) {
      if (entry.isFile && isExtensionExecutableName(entry.name, this.platform)) {
        names.push(entry.name)
      }
    }

    return names
  }

  /**
   * Clones a GitHub repository into `<cwd>/<repository>`, builds it with cargo in release
   * mode and copies the resulting binary into the bin directory as `just-<repository>`.
   *
   * A failed build leaves the working copy in place for inspection. A failed final cleanup is
   * reported even though the binary is already installed.
   *
   * @param url GitHub repository URL.
   * @returns Repository name and installed binary path.
   */
  async install(url: string): Promise<ExtensionInstallResult> {
    const repository = parseRepositoryName(url)
    const workingDirectory = path.join(this.resolveWorkingRoot(), repository)
    const manifestPath = path.join(workingDirectory, "Cargo.toml")
    const builtBinaryPath = path.join(
      workingDirectory,
      "target",
      "release",
      toPlatformExecutableName(repository, this.platform)
    )
    const binaryPath = this.resolvePath(repository)
    const log = this.logger.child({ repository })

    if (await this.fileSystem.exists(workingDirectory)) {
      log.debug({ workingDirectory }, "Removing stale working directory")
      await guard("IoError", `Failed to remove stale working directory ${workingDirectory}`, () =>
        this.fileSystem.removeDirAll(workingDirectory)
      )
    }

    log.debug({ url, workingDirectory }, "Cloning repository")
    await guard("FetchFailed", `Failed to fetch ${url}`, () =>
      this.commandRunner.run("git", ["clone", url, workingDirectory])
    )

    log.debug({ manifestPath }, "Building extension with cargo")
    await guard("BuildFailed", `Failed to build ${repository}`, () =>
      this.commandRunner.run("cargo", ["build", "--release", "--manifest-path", manifestPath])
    )

    log.debug({ builtBinaryPath, binaryPath }, "Copying extension binary")
    await guard("IoError", `Failed to copy ${builtBinaryPath} to ${binaryPath}`, () =>
      this.fileSystem.copyFile(builtBinaryPath, binaryPath)
    )

    log.debug({ workingDirectory }, "Removing working directory")
    await guard(
      "IoError",
      `Installed ${binaryPath} but failed to remove working directory ${workingDirectory}`,
      () => this.fileSystem.removeDirAll(workingDirectory)
    )

    log.info({ binaryPath }, "Extension installed")

    return { repository, binaryPath }
  }

  /**
   * Removes the installed binary for `name`. Not being installed is not an error.
   *
   * @returns Removed path, or null when nothing was installed.
   */
  async uninstall(name: string): Promise<string | null> {
    const binaryPath = await this.locate(name)
    if (!binaryPath) {
      this.logger.debug({ name }, "Extension not installed, nothing to remove")
      return null
    }

    await guard("IoError", `Failed to remove ${binaryPath}`, () =>
      this.fileSystem.removeFile(binaryPath)
    )
    this.logger.info({ binaryPath }, "Extension uninstalled")

    return binaryPath
  }
}
