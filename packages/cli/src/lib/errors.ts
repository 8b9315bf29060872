export class ConfigError extends Error {
  public readonly source: string
  public readonly issues: string[]

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
    this.source = source
    this.issues = issues
  }
}

export class OutputWriteError extends Error {
  public readonly path: string
  public readonly originalError?: unknown

  constructor(path: string, originalError?: unknown) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError)
    super(`Failed to write ${path}: ${reason}`)
    this.name = 'OutputWriteError'
    this.path = path
    this.originalError = originalError
  }
}

export class ConversionError extends Error {
  public readonly input: string

  constructor(input: string, message: string) {
    super(message)
    this.name = 'ConversionError'
    this.input = input
  }
}
