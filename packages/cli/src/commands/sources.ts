import { stringArg } from '../lib/helpers'
import { buildSources, SOURCE_FORMATS, type SourceFormat } from '../lib/sources/builder'
import type { CliCommand } from '../registry'
import { unknownTargets } from './targets'

function isSourceFormat(value: string): value is SourceFormat {
  return SOURCE_FORMATS.some((format) => format === value)
}

export const sourcesCommand: CliCommand = {
  command: 'sources',
  summary: 'Build translation-platform source files from merged channels',
  options: {
    string: ['format'],
    array: ['target'],
    alias: { f: 'format', t: 'target' },
    default: { format: 'json' },
  },
  run: ({ args, logger, loadConfig }) => {
    const format = stringArg(args, 'format') ?? 'json'
    if (!isSourceFormat(format)) {
      logger.error('Unsupported format "%s" (expected %s)', format, SOURCE_FORMATS.join(' or '))
      return 1
    }

    const { config } = loadConfig()
    const only = Array.isArray(args.target) ? args.target : undefined
    const unknown = unknownTargets(config, only)
    if (unknown.length) {
      logger.error('Unknown target(s): %s', unknown.join(', '))
      return 1
    }

    const report = buildSources(config, { format, logger, only })
    if (report.failures.length) return 1
    logger.success('Source files updated. Output: %s', config.sourcesDir)
    return 0
  },
}
