import { homedir } from "node:os"
import path from "node:path"
import { mkdir, readFile, writeFile } from "node:fs/promises"
import { z } from "zod"

const extensionConfigSchema = z.object({
  version: z.literal(1),
  binPath: z.string().min(1, "binPath must be a non-empty string"),
})

export type ExtensionConfig = z.infer<typeof extensionConfigSchema>

export type ResolvedExtensionConfig = {
  config: ExtensionConfig
  configPath: string
  created: boolean
}

type ConfigEnvironment = Partial<Pick<NodeJS.ProcessEnv, "JUST_BIN_PATH">>

const CONFIG_RELATIVE_PATH = path.join(".config", "just", "extensions.json")

/**
 * Anchors the extension config under the user config directory so it does not depend on the
 * current working directory.
 *
 * @param homeDirectory Home directory override used by tests.
 * @returns Absolute path to the persistent config file.
 */
export const resolveExtensionConfigPath = (homeDirectory = homedir()): string => {
  return path.join(homeDirectory, CONFIG_RELATIVE_PATH)
}

export const buildDefaultExtensionConfig = (homeDirectory = homedir()): ExtensionConfig => {
  return {
    version: 1,
    binPath: path.join(homeDirectory, ".just", "bin"),
  }
}

const parseExtensionConfig = (source: string, configPath: string): ExtensionConfig => {
  let parsed: unknown

  try {
    parsed = JSON.parse(source)
  } catch {
    throw new Error(`Invalid JSON in extension config: ${configPath}`)
  }

  const validated = extensionConfigSchema.safeParse(parsed)

  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new Error(`Invalid extension config in ${configPath}: ${detail}`)
  }

  return validated.data
}

/**
 * `JUST_BIN_PATH` wins over the persisted value so one-off installs into another directory
 * need no config edit.
 */
export const applyEnvironmentOverrides = (
  config: ExtensionConfig,
  environment: ConfigEnvironment = process.env
): ExtensionConfig => {
  const binPath = environment.JUST_BIN_PATH?.trim()
  if (!binPath) {
    return config
  }

  return {
    ...config,
    binPath: path.resolve(binPath),
  }
}

/**
 * Loads the validated config, writing defaults on first use.
 *
 * @param homeDirectory Home directory override used by tests.
 * @param configPath Optional explicit config path.
 * @returns Loaded or newly created config metadata.
 */
export const ensureExtensionConfigFile = async (
  homeDirectory = homedir(),
  configPath = resolveExtensionConfigPath(homeDirectory)
): Promise<ResolvedExtensionConfig> => {
  try {
    const existing = await readFile(configPath, "utf8")

    return {
      config: parseExtensionConfig(existing, configPath),
      configPath,
      created: false,
    }
  } catch (error) {
    const isMissing = error instanceof Error && "code" in error && error.code === "ENOENT"

    if (!isMissing) {
      throw error
    }
  }

  const defaults = buildDefaultExtensionConfig(homeDirectory)

  await mkdir(path.dirname(configPath), { recursive: true })
  await writeFile(configPath, `${JSON.stringify(defaults, null, 2)}\n`, "utf8")

  return {
    config: defaults,
    configPath,
    created: true,
  }
}
