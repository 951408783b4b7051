import { Command, CommanderError } from "commander"

export type ExtensionCommand =
  | { name: "help" }
  | { name: "list" }
  | { name: "install"; url: string }
  | { name: "uninstall"; extension: string }
  | { name: "which"; extension: string }
  | { name: "path"; extension: string }

const HELP_ARGUMENTS = ["help", "--help", "-h"]

const buildParser = (select: (command: ExtensionCommand) => void): Command => {
  const parser = new Command("just-ext")

  parser
    .description("Manage just extensions built from GitHub repositories")
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    })
    .allowUnknownOption(false)
    .allowExcessArguments(false)

  parser
    .command("list")
    .description("list installed extensions")
    .allowExcessArguments(false)
    .action(() => select({ name: "list" }))

  parser
    .command("install")
    .description("clone, build and install an extension")
    .argument("<url>", "GitHub repository URL")
    .allowExcessArguments(false)
    .action((url: string) => select({ name: "install", url }))

  parser
    .command("uninstall")
    .description("remove an installed extension")
    .argument("<name>", "extension name, with or without the just- prefix")
    .allowExcessArguments(false)
    .action((extension: string) => select({ name: "uninstall", extension }))

  parser
    .command("which")
    .description("print the path of an installed extension")
    .argument("<name>", "extension name, with or without the just- prefix")
    .allowExcessArguments(false)
    .action((extension: string) => select({ name: "which", extension }))

  parser
    .command("path")
    .description("print where an extension is or would be installed")
    .argument("<name>", "extension name, with or without the just- prefix")
    .allowExcessArguments(false)
    .action((extension: string) => select({ name: "path", extension }))

  return parser
}

export const renderUsage = (): string => {
  return buildParser(() => undefined).helpInformation()
}

/**
 * Maps raw arguments onto one supported command. Zero arguments or a help flag select `help`.
 *
 * @param argv Raw user arguments from process argv.
 * @returns Parsed command with its operand.
 */
export const parseCommand = (argv: string[]): ExtensionCommand => {
  const [first] = argv
  if (first === undefined || HELP_ARGUMENTS.includes(first)) {
    return { name: "help" }
  }

  const selection: { command?: ExtensionCommand } = {}
  const parser = buildParser((command) => {
    selection.command = command
  })

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.help") {
        return { name: "help" }
      }

      throw new Error(error.message)
    }

    if (error instanceof Error) {
      throw error
    }

    throw new Error("Unknown command parsing error")
  }

  if (!selection.command) {
    throw new Error(`Unknown command: ${first}`)
  }

  return selection.command
}
