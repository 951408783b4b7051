import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import { tmpdir } from "node:os"

import { afterEach, describe, expect, it } from "vitest"

import {
  applyEnvironmentOverrides,
  buildDefaultExtensionConfig,
  ensureExtensionConfigFile,
  resolveExtensionConfigPath,
} from "../../src/config/extension-config.js"

const TEMP_PREFIX = path.join(tmpdir(), "just-extension-config-")
const cleanupPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

describe("resolveExtensionConfigPath", () => {
  it("resolves under ~/.config/just", () => {
    expect(resolveExtensionConfigPath("/tmp/test-home")).toBe(
      "/tmp/test-home/.config/just/extensions.json"
    )
  })
})

describe("buildDefaultExtensionConfig", () => {
  it("keeps binaries under ~/.just/bin", () => {
    expect(buildDefaultExtensionConfig("/tmp/test-home")).toEqual({
      version: 1,
      binPath: "/tmp/test-home/.just/bin",
    })
  })
})

describe("ensureExtensionConfigFile", () => {
  it("creates the config file with defaults when missing", async () => {
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    const result = await ensureExtensionConfigFile(homeDirectory)
    const saved = await readFile(result.configPath, "utf8")

    expect(result.created).toBe(true)
    expect(result.config).toEqual(buildDefaultExtensionConfig(homeDirectory))
    expect(JSON.parse(saved)).toEqual(buildDefaultExtensionConfig(homeDirectory))
  })

  it("loads existing config without rewriting it", async () => {
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    const configPath = resolveExtensionConfigPath(homeDirectory)
    const custom = {
      version: 1,
      binPath: path.join(homeDirectory, "custom-bin"),
    }

    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(configPath, `${JSON.stringify(custom, null, 2)}\n`, "utf8")

    const result = await ensureExtensionConfigFile(homeDirectory)

    expect(result.created).toBe(false)
    expect(result.config).toEqual(custom)
  })

  it("ignores keys the schema does not know", async () => {
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    const configPath = resolveExtensionConfigPath(homeDirectory)

    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(
      configPath,
      JSON.stringify({ version: 1, justHome: "/tmp/just", binPath: "/tmp/just/bin" }),
      "utf8"
    )

    const result = await ensureExtensionConfigFile(homeDirectory)

    expect(result.config).toEqual({ version: 1, binPath: "/tmp/just/bin" })
  })

  it("throws when existing config is not json", async () => {
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    const configPath = resolveExtensionConfigPath(homeDirectory)

    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(configPath, "not-json", "utf8")

    await expect(ensureExtensionConfigFile(homeDirectory)).rejects.toThrow("Invalid JSON")
  })

  it("names the offending field when the schema does not match", async () => {
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    const configPath = resolveExtensionConfigPath(homeDirectory)

    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(
      configPath,
      JSON.stringify({ version: 1, binPath: "" }),
      "utf8"
    )

    await expect(ensureExtensionConfigFile(homeDirectory)).rejects.toThrow(
      `Invalid extension config in ${configPath}: binPath: binPath must be a non-empty string`
    )
  })
})

describe("applyEnvironmentOverrides", () => {
  const base = buildDefaultExtensionConfig("/tmp/test-home")

  it("keeps the persisted bin path without an override", () => {
    expect(applyEnvironmentOverrides(base, {})).toBe(base)
    expect(applyEnvironmentOverrides(base, { JUST_BIN_PATH: "  " })).toBe(base)
  })

  it("replaces the bin path from JUST_BIN_PATH", () => {
    expect(applyEnvironmentOverrides(base, { JUST_BIN_PATH: "/opt/just/bin" })).toEqual({
      ...base,
      binPath: "/opt/just/bin",
    })
  })
})
