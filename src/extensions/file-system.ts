import path from "node:path"
import { access, copyFile, opendir, rm, stat, unlink } from "node:fs/promises"
import { constants } from "node:fs"

export type WalkEntry = {
  path: string
  name: string
  isFile: boolean
}

/**
 * Filesystem side effects used by the extension manager, injectable for hermetic tests.
 */
export type FileSystem = {
  exists: (target: string) => Promise<boolean>
  removeDirAll: (target: string) => Promise<void>
  removeFile: (target: string) => Promise<void>
  copyFile: (source: string, destination: string) => Promise<void>
  /**
   * Yields every entry below `root`, depth first. Symlinks are reported by their target and
   * not followed. Entries that cannot be read are skipped, and a directory that fails midway
   * ends its own walk only.
   */
  walk: (root: string) => AsyncIterable<WalkEntry>
}

const isLinkedFile = async (target: string): Promise<boolean | null> => {
  try {
    return (await stat(target)).isFile()
  } catch {
    return null
  }
}

const walkDirectory = async function* (directory: string): AsyncGenerator<WalkEntry> {
  let handle: Awaited<ReturnType<typeof opendir>>

  try {
    handle = await opendir(directory)
  } catch {
    return
  }

  const subdirectories: string[] = []

  try {
    for await (const entry of handle) {
      const entryPath = path.join(directory, entry.name)

      if (entry.isDirectory()) {
        yield { path: entryPath, name: entry.name, isFile: false }
        subdirectories.push(entryPath)
        continue
      }

      // dangling links are skipped
      const isFile = entry.isSymbolicLink() ? await isLinkedFile(entryPath) : entry.isFile()
      if (isFile === null) {
        continue
      }

      yield { path: entryPath, name: entry.name, isFile }
    }
  } catch {
    // readdir failed partway, keep what was already yielded
  }

  for (const subdirectory of subdirectories) {
    yield* walkDirectory(subdirectory)
  }
}

export const createNodeFileSystem = (): FileSystem => {
  return {
    exists: async (target) => {
      try {
        await access(target, constants.F_OK)
        return true
      } catch {
        return false
      }
    },
    removeDirAll: async (target) => {
      await rm(target, { recursive: true, force: true })
    },
    removeFile: async (target) => {
      await unlink(target)
    },
    copyFile: async (source, destination) => {
      await copyFile(source, destination)
    },
    walk: (root) => walkDirectory(root),
  }
}
