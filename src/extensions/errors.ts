export type ExtensionErrorKind =
  | "InvalidUrl"
  | "UnsupportedProvider"
  | "MissingRepositoryName"
  | "FetchFailed"
  | "BuildFailed"
  | "IoError"

/**
 * Failure raised by extension operations. `kind` tells the caller which pipeline stage broke;
 * `message` is meant for humans.
 */
export class ExtensionError extends Error {
  readonly kind: ExtensionErrorKind

  constructor(kind: ExtensionErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "ExtensionError"
    this.kind = kind
  }
}

/**
 * Non-zero exit or spawn failure of an external program.
 */
export class ProcessError extends Error {
  readonly program: string
  readonly args: readonly string[]
  readonly exitCode: number | null
  readonly signal: NodeJS.Signals | null
  readonly stderr: string

  constructor(input: {
    program: string
    args: readonly string[]
    exitCode?: number | null
    signal?: NodeJS.Signals | null
    stderr?: string
    cause?: unknown
  }) {
    const commandLine = [input.program, ...input.args].join(" ")
    const stderr = input.stderr?.trim() ?? ""
    const reason =
      input.cause instanceof Error
        ? input.cause.message
        : input.signal
          ? `terminated by ${input.signal}`
          : `exited with code ${input.exitCode ?? "unknown"}`

    super(
      stderr.length > 0 ? `${commandLine} ${reason}: ${stderr}` : `${commandLine} ${reason}`,
      input.cause === undefined ? undefined : { cause: input.cause }
    )
    this.name = "ProcessError"
    this.program = input.program
    this.args = input.args
    this.exitCode = input.exitCode ?? null
    this.signal = input.signal ?? null
    this.stderr = stderr
  }
}

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}
