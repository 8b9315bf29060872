import type { LoadedConfig } from './lib/config'
import type { CliLogger, ParseArgsOptions, ParsedArgs } from './lib/helpers'

export type CommandContext = {
  args: ParsedArgs
  positional: string[]
  /** Base directory for relative paths (`--cwd`, default the process cwd) */
  cwd: string
  logger: CliLogger
  loadConfig: () => LoadedConfig
}

export type CliCommand = {
  command: string
  summary: string
  /** Positional placeholders shown in usage, e.g. `<input> [output]` */
  positional?: string[]
  options?: ParseArgsOptions
  run: (ctx: CommandContext) => number | Promise<number>
}

let _commands: CliCommand[] | null = null

export function registerCliCommands(commands: CliCommand[]): void {
  _commands = commands
}

export function getCliCommands(): CliCommand[] {
  return _commands ?? []
}

export function findCliCommand(name: string): CliCommand | undefined {
  return getCliCommands().find((cmd) => cmd.command === name)
}
