export {
  parseCliArgs,
  stringArg,
  booleanArg,
  buildUsage,
  type ParsedArgs,
  type ParseArgsOptions,
  type ParseArgsResult,
} from './args'

export {
  CliLogger,
  cliLogger,
  silentLogger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logger'
