/**
 * CLI Argument Parsing
 *
 * Shared by every langmerge command so flags behave the same everywhere.
 *
 * @example
 * ```ts
 * const { args, positional } = parseCliArgs(rest, {
 *   string: ['config', 'format'],
 *   boolean: ['crowdin', 'verbose'],
 *   alias: { c: 'config' },
 * })
 * ```
 */

export type ParsedArgs = Record<string, string | boolean | string[]>

export interface ParseArgsOptions {
  /** Keys that should be parsed as strings */
  string?: string[]
  /** Keys that should be parsed as booleans; `--no-<key>` sets them to false */
  boolean?: string[]
  /** Keys that may be given several times and collect into an array */
  array?: string[]
  /** Aliases for keys (e.g., { c: 'config' }) */
  alias?: Record<string, string>
  default?: Record<string, string | boolean | string[]>
}

export interface ParseArgsResult {
  args: ParsedArgs
  /** Non-flag values, in order */
  positional: string[]
}

/**
 * Parse an argv-like array.
 *
 * Supports `--name=value`, `--name value`, `--flag`, `--no-flag` for
 * declared booleans, `-n value`, combined short booleans (`-vq`) and `--` to
 * end flag parsing.
 */
export function parseCliArgs(argv: string[], options: ParseArgsOptions = {}): ParseArgsResult {
  const args: ParsedArgs = { ...options.default }
  const positional: string[] = []
  const isBoolean = (key: string) => options.boolean?.includes(key) ?? false
  const resolveKey = (key: string) => options.alias?.[key] ?? key

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg) continue

    if (arg === '--') {
      positional.push(...argv.slice(i + 1))
      break
    }

    if (arg.startsWith('--')) {
      const longArg = arg.slice(2)
      const equalIndex = longArg.indexOf('=')

      if (equalIndex !== -1) {
        setArgValue(args, resolveKey(longArg.slice(0, equalIndex)), longArg.slice(equalIndex + 1), options)
        continue
      }

      const key = resolveKey(longArg)
      if (isBoolean(key)) {
        args[key] = true
        continue
      }
      if (key.startsWith('no-') && isBoolean(key.slice(3))) {
        args[key.slice(3)] = false
        continue
      }

      const nextArg = argv[i + 1]
      if (nextArg !== undefined && !nextArg.startsWith('-')) {
        setArgValue(args, key, nextArg, options)
        i++
      } else {
        args[key] = true
      }
      continue
    }

    if (arg.startsWith('-') && arg.length > 1) {
      const shortFlags = arg.slice(1)

      for (let j = 0; j < shortFlags.length; j++) {
        const key = resolveKey(shortFlags.charAt(j))

        if (j === shortFlags.length - 1) {
          // only the last flag of a group can take a value
          const nextArg = argv[i + 1]
          if (nextArg !== undefined && !nextArg.startsWith('-') && !isBoolean(key)) {
            setArgValue(args, key, nextArg, options)
            i++
          } else {
            args[key] = true
          }
        } else {
          args[key] = true
        }
      }
      continue
    }

    positional.push(arg)
  }

  return { args, positional }
}

function setArgValue(args: ParsedArgs, key: string, value: string, options: ParseArgsOptions): void {
  if (options.array?.includes(key)) {
    const existing = args[key]
    args[key] = Array.isArray(existing) ? [...existing, value] : [value]
  } else {
    args[key] = value
  }
}

/** Read a string flag, ignoring booleans and arrays given for it. */
export function stringArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key]
  return typeof value === 'string' ? value : undefined
}

export function booleanArg(args: ParsedArgs, key: string): boolean | undefined {
  const value = args[key]
  return typeof value === 'boolean' ? value : undefined
}

export function buildUsage(command: string, options: ParseArgsOptions, positional: string[] = []): string {
  const parts = [command, ...positional]

  for (const key of options.string ?? []) {
    parts.push(`[--${key} <value>]`)
  }

  for (const key of options.boolean ?? []) {
    parts.push(`[--${key}]`)
  }

  return parts.join(' ')
}
