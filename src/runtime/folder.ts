import { mkdir } from "node:fs/promises"

import type { ExtensionConfig } from "../config/extension-config.js"

/**
 * Directory layout handed to the extension manager. Read-only once built.
 */
export type Folder = {
  readonly binPath: string
}

/**
 * Ensures the binary directory exists ahead of install so the copy step can assume a stable
 * filesystem layout.
 *
 * @param config Validated extension config.
 * @returns Folder with created or verified paths.
 */
export const resolveExtensionFolder = async (config: ExtensionConfig): Promise<Folder> => {
  await mkdir(config.binPath, { recursive: true })

  return Object.freeze({ binPath: config.binPath })
}
