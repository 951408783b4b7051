import { spawn } from "node:child_process"

import { ProcessError } from "./errors.js"

export type RunOptions = {
  cwd?: string
}

/**
 * Runs an external program to completion. Resolves on exit code 0, rejects with
 * `ProcessError` otherwise.
 */
export type CommandRunner = {
  run: (program: string, args: readonly string[], options?: RunOptions) => Promise<void>
}

const STDERR_TAIL_LINES = 20

/**
 * Spawns programs with stdout inherited so clone and build progress stays visible, while the
 * tail of stderr is kept for the failure message.
 */
export const createSpawnCommandRunner = (): CommandRunner => {
  return {
    run: async (program, args, options = {}) => {
      const child = spawn(program, [...args], {
        cwd: options.cwd,
        stdio: ["ignore", "inherit", "pipe"],
      })

      const stderrLines: string[] = []
      let partialLine = ""
      const keepLines = (lines: string[]): void => {
        stderrLines.push(...lines.filter(Boolean))
        if (stderrLines.length > STDERR_TAIL_LINES) {
          stderrLines.splice(0, stderrLines.length - STDERR_TAIL_LINES)
        }
      }

      child.stderr.on("data", (chunk: Buffer) => {
        process.stderr.write(chunk)
        // a chunk may end mid-line, carry the rest over to the next one
        const lines = `${partialLine}${chunk.toString("utf8")}`.split("\n")
        partialLine = lines.pop() ?? ""
        keepLines(lines)
      })

      await new Promise<void>((resolve, reject) => {
        child.once("error", (error) => {
          reject(new ProcessError({ program, args, cause: error }))
        })

        child.once("close", (code, signal) => {
          if (code === 0) {
            resolve()
            return
          }

          keepLines([partialLine])

          reject(
            new ProcessError({
              program,
              args,
              exitCode: code,
              signal,
              stderr: stderrLines.join("\n"),
            })
          )
        })
      })
    },
  }
}
