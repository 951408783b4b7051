import { describe, expect, it } from "vitest"

import {
  ExtensionError,
  canonicalizeExtensionName,
  isExtensionExecutableName,
  parseRepositoryName,
  resolveExecutableSuffix,
  toPlatformExecutableName,
} from "../../src/extensions/index.js"

const captureError = (action: () => unknown): ExtensionError => {
  try {
    action()
  } catch (error) {
    if (error instanceof ExtensionError) {
      return error
    }

    throw error
  }

  throw new Error("Expected an ExtensionError")
}

describe("canonicalizeExtensionName", () => {
  it("prefixes bare names with just-", () => {
    expect(canonicalizeExtensionName("fmt")).toBe("just-fmt")
  })

  it("keeps names that already carry the prefix", () => {
    expect(canonicalizeExtensionName("just-fmt")).toBe("just-fmt")
  })

  it("is idempotent", () => {
    for (const name of ["", "fmt", "just-", "just-fmt", "justfmt", "just-just-fmt"]) {
      const once = canonicalizeExtensionName(name)
      expect(canonicalizeExtensionName(once)).toBe(once)
    }
  })

  it("treats a prefix-like name without the dash as bare", () => {
    expect(canonicalizeExtensionName("justfmt")).toBe("just-justfmt")
  })
})

describe("toPlatformExecutableName", () => {
  it("appends .exe on windows", () => {
    expect(toPlatformExecutableName("just-fmt", "win32")).toBe("just-fmt.exe")
  })

  it("leaves names unchanged on posix platforms", () => {
    expect(toPlatformExecutableName("just-fmt", "linux")).toBe("just-fmt")
    expect(toPlatformExecutableName("just-fmt", "darwin")).toBe("just-fmt")
  })

  it("agrees with resolveExecutableSuffix", () => {
    expect(resolveExecutableSuffix("win32")).toBe(".exe")
    expect(resolveExecutableSuffix("linux")).toBe("")
  })
})

describe("isExtensionExecutableName", () => {
  it("requires the prefix and no extension on posix", () => {
    expect(isExtensionExecutableName("just-foo", "linux")).toBe(true)
    expect(isExtensionExecutableName("bar", "linux")).toBe(false)
    expect(isExtensionExecutableName("just-baz.tmp", "linux")).toBe(false)
  })

  it("requires the final extension to be .exe on windows", () => {
    expect(isExtensionExecutableName("just-foo.exe", "win32")).toBe(true)
    expect(isExtensionExecutableName("just-foo.tmp.exe", "win32")).toBe(true)
    expect(isExtensionExecutableName("just-foo", "win32")).toBe(false)
    expect(isExtensionExecutableName("foo.exe", "win32")).toBe(false)
  })
})

describe("parseRepositoryName", () => {
  it("returns the segment after the owner", () => {
    expect(parseRepositoryName("https://github.com/owner/repo")).toBe("repo")
  })

  it("ignores segments after the repository", () => {
    expect(parseRepositoryName("https://github.com/owner/repo/tree/main")).toBe("repo")
  })

  it("rejects other hosting providers", () => {
    const error = captureError(() => parseRepositoryName("https://gitlab.com/owner/repo"))

    expect(error.kind).toBe("UnsupportedProvider")
    expect(error.message).toBe(
      "Currently, only github.com is supported for just extensions (got 'gitlab.com')"
    )
  })

  it("reports malformed input as an invalid url", () => {
    const error = captureError(() => parseRepositoryName("not a url"))

    expect(error.kind).toBe("InvalidUrl")
    expect(error.message).toBe("Invalid URL 'not a url'")
  })

  it("reports a missing repository segment", () => {
    const error = captureError(() => parseRepositoryName("https://github.com/owner"))

    expect(error.kind).toBe("MissingRepositoryName")
  })

  it("treats an empty repository segment as missing", () => {
    const error = captureError(() => parseRepositoryName("https://github.com/owner/"))

    expect(error.kind).toBe("MissingRepositoryName")
  })

  it("checks the host before the path", () => {
    const error = captureError(() => parseRepositoryName("https://example.com/owner"))

    expect(error.kind).toBe("UnsupportedProvider")
  })
})
