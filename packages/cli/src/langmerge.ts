import path from 'node:path'
import { builtinCommands } from './commands'
import { loadConfig } from './lib/config'
import { ConfigError, ConversionError } from './lib/errors'
import {
  buildUsage,
  cliLogger,
  parseCliArgs,
  stringArg,
  booleanArg,
  type CliLogger,
  type ParseArgsOptions,
} from './lib/helpers'
import { findCliCommand, getCliCommands, registerCliCommands, type CliCommand } from './registry'

const GLOBAL_OPTIONS: Required<Pick<ParseArgsOptions, 'string' | 'boolean' | 'alias'>> = {
  string: ['config', 'cwd'],
  boolean: ['verbose', 'quiet', 'color', 'help'],
  alias: { c: 'config', v: 'verbose', q: 'quiet', h: 'help' },
}

function withGlobalOptions(options: ParseArgsOptions = {}): ParseArgsOptions {
  return {
    ...options,
    string: [...GLOBAL_OPTIONS.string, ...(options.string ?? [])],
    boolean: [...GLOBAL_OPTIONS.boolean, ...(options.boolean ?? [])],
    alias: { ...GLOBAL_OPTIONS.alias, ...options.alias },
  }
}

export function usageFor(cmd: CliCommand): string {
  return buildUsage(`langmerge ${cmd.command}`, cmd.options ?? {}, cmd.positional)
}

function printHelp(logger: CliLogger): void {
  logger.info('Usage: langmerge <command> [args]')
  logger.info('')
  logger.info('Commands:')
  logger.list(getCliCommands().map((cmd) => `${cmd.command.padEnd(10)} ${cmd.summary}`))
  logger.info('')
  logger.info('Global options: --config <file>, --cwd <dir>, --verbose, --quiet, --no-color')
}

export interface RunOptions {
  logger?: CliLogger
}

/**
 * Entry point behind the `langmerge` binary. Returns the process exit code
 * instead of exiting so it can be driven from tests.
 */
export async function run(argv: string[] = process.argv, options: RunOptions = {}): Promise<number> {
  const [, , commandName, ...rest] = argv
  const logger = options.logger ?? cliLogger

  if (getCliCommands().length === 0) registerCliCommands(builtinCommands)

  if (!commandName || commandName === 'help' || commandName === '--help' || commandName === '-h') {
    printHelp(logger)
    return commandName ? 0 : 1
  }

  const cmd = findCliCommand(commandName)
  if (!cmd) {
    logger.error('Unknown command "%s". Available: %s', commandName, getCliCommands().map((c) => c.command).join(', '))
    return 1
  }

  const { args, positional } = parseCliArgs(rest, withGlobalOptions(cmd.options))
  if (booleanArg(args, 'help')) {
    logger.info('Usage: %s', usageFor(cmd))
    return 0
  }

  const level = booleanArg(args, 'verbose') ? 'debug' : booleanArg(args, 'quiet') ? 'warn' : undefined
  const colors = booleanArg(args, 'color')
  if (level !== undefined || colors !== undefined) {
    logger.configure({ ...(level ? { level } : {}), ...(colors !== undefined ? { colors } : {}) })
  }

  const cwd = path.resolve(stringArg(args, 'cwd') ?? process.cwd())
  const configPath = stringArg(args, 'config')

  const started = Date.now()
  logger.debug('Running %s %s', commandName, rest.join(' '))
  try {
    const code = await cmd.run({
      args,
      positional,
      cwd,
      logger,
      loadConfig: () => loadConfig({ cwd, configPath }),
    })
    logger.debug('Done in %dms', Date.now() - started)
    return code
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ConversionError) {
      logger.error(err.message)
      return 1
    }
    logger.error('Failed: %s', err instanceof Error ? err.message : String(err))
    return 1
  }
}
