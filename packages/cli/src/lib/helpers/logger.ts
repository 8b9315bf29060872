/**
 * CLI Logger
 *
 * Leveled, optionally colored output for langmerge commands. Library code
 * accepts a `CliLogger` so callers (and tests) can redirect or silence it.
 *
 * @example
 * ```ts
 * import { cliLogger } from './lib/helpers'
 *
 * const log = cliLogger.forModule('merge')
 * log.info('Processing target %s', 'release')
 * log.success('Merged %d files', 4)
 * ```
 */

import { format } from 'node:util'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success'

export type LogSink = {
  write(chunk: string): unknown
}

export interface LoggerOptions {
  /** Minimum log level to display */
  level?: LogLevel | 'silent'
  colors?: boolean
  /** Prefix rendered as `[prefix]` before every message */
  prefix?: string
  /** Sink for debug/info/warn/success (default: process.stdout) */
  output?: LogSink
  /** Sink for errors (default: process.stderr) */
  errorOutput?: LogSink
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
}

const LEVEL_WEIGHTS: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_ICONS: Record<LogLevel, string> = {
  debug: '·',
  info: 'ℹ',
  warn: '⚠',
  error: '✖',
  success: '✔',
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  success: COLORS.green,
}

export class CliLogger {
  private options: Required<LoggerOptions>

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level ?? 'info',
      colors: options.colors ?? true,
      prefix: options.prefix ?? '',
      output: options.output ?? process.stdout,
      errorOutput: options.errorOutput ?? process.stderr,
    }
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options }
  }

  get level(): LogLevel | 'silent' {
    return this.options.level
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[this.options.level]
  }

  private paint(color: string, text: string): string {
    return this.options.colors ? `${color}${text}${COLORS.reset}` : text
  }

  private format(level: LogLevel, message: string): string {
    const parts: string[] = []

    parts.push(this.paint(LEVEL_COLORS[level], LEVEL_ICONS[level]))
    if (this.options.prefix) {
      parts.push(this.paint(COLORS.cyan, `[${this.options.prefix}]`))
    }
    parts.push(message)

    return parts.join(' ')
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return
    const sink = level === 'error' ? this.options.errorOutput : this.options.output
    sink.write(this.format(level, message) + '\n')
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', format(message, ...args))
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', format(message, ...args))
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', format(message, ...args))
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', format(message, ...args))
  }

  success(message: string, ...args: unknown[]): void {
    this.write('success', format(message, ...args))
  }

  /**
   * Derive a logger that shares this one's settings; nested prefixes are
   * joined with `:` (e.g. `merge:beta`).
   */
  withPrefix(prefix: string): CliLogger {
    return new CliLogger({
      ...this.options,
      prefix: this.options.prefix ? `${this.options.prefix}:${prefix}` : prefix,
    })
  }

  forModule(module: string): CliLogger {
    return this.withPrefix(module)
  }

  list(items: string[], options: { bullet?: string; indent?: number } = {}): void {
    const bullet = options.bullet ?? '  •'
    const indent = ' '.repeat(options.indent ?? 0)
    for (const item of items) {
      this.info(`${indent}${bullet} ${item}`)
    }
  }
}

export const cliLogger = new CliLogger()

/** A logger that drops everything; the default for library calls without one. */
export const silentLogger = new CliLogger({ level: 'silent' })
