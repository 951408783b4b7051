import path from "node:path"

import { ExtensionError } from "./errors.js"

export const EXTENSION_PREFIX = "just-"

export const SUPPORTED_PROVIDER_HOST = "github.com"

/**
 * Executable suffix of the host platform, `.exe` on Windows and empty elsewhere.
 */
export const resolveExecutableSuffix = (platform: NodeJS.Platform = process.platform): string => {
  return platform === "win32" ? ".exe" : ""
}

/**
 * Prefixes `just-` unless the name already carries it. Applying it twice is a no-op.
 */
export const canonicalizeExtensionName = (name: string): string => {
  return name.startsWith(EXTENSION_PREFIX) ? name : `${EXTENSION_PREFIX}${name}`
}

export const toPlatformExecutableName = (
  name: string,
  platform: NodeJS.Platform = process.platform
): string => {
  return `${name}${resolveExecutableSuffix(platform)}`
}

/**
 * Whether a file name follows the `just-<name><suffix>` convention. The whole extension must
 * equal the suffix, so `just-fmt.tmp` does not count on platforms without one.
 */
export const isExtensionExecutableName = (
  fileName: string,
  platform: NodeJS.Platform = process.platform
): boolean => {
  return (
    fileName.startsWith(EXTENSION_PREFIX) &&
    path.extname(fileName) === resolveExecutableSuffix(platform)
  )
}

/**
 * Extracts the repository name from a GitHub URL, i.e. `repo` from
 * `https://github.com/owner/repo`.
 *
 * Checks run in a fixed order: a malformed URL is reported before an unsupported host, and
 * both before a missing repository segment.
 *
 * @param value Raw URL given by the user.
 * @returns Repository segment, never empty.
 */
export const parseRepositoryName = (value: string): string => {
  let url: URL

  try {
    url = new URL(value)
  } catch (error) {
    throw new ExtensionError("InvalidUrl", `Invalid URL '${value}'`, error)
  }

  if (url.hostname !== SUPPORTED_PROVIDER_HOST) {
    throw new ExtensionError(
      "UnsupportedProvider",
      `Currently, only ${SUPPORTED_PROVIDER_HOST} is supported for just extensions (got '${url.hostname}')`
    )
  }

  // pathname always starts with "/", so index 0 is the empty root segment
  const [, , repository] = url.pathname.split("/")
  if (!repository) {
    throw new ExtensionError("MissingRepositoryName", `No repository name in URL '${value}'`)
  }

  return repository
}
