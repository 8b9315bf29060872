import { formatPattern } from '../lib/merge/ordering'
import { mergeChannels } from '../lib/merge/orchestrator'
import type { CliCommand } from '../registry'
import { unknownTargets } from './targets'

export const mergeCommand: CliCommand = {
  command: 'merge',
  summary: 'Merge per-module language files into one file per channel and language',
  options: {
    array: ['target'],
    alias: { t: 'target' },
  },
  run: ({ args, logger, loadConfig }) => {
    const { config, file } = loadConfig()
    logger.debug('Configuration: %s', file ?? 'defaults')
    logger.debug('Merge order: %s', config.mergeOrder.map(formatPattern).join(', '))

    const only = Array.isArray(args.target) ? args.target : undefined
    const unknown = unknownTargets(config, only)
    if (unknown.length) {
      logger.error('Unknown target(s): %s', unknown.join(', '))
      return 1
    }

    const report = mergeChannels(config, { logger, only })
    const written = report.channels.flatMap((c) => c.languages).filter((l) => l.status === 'merged').length

    if (report.failures.length) {
      logger.error('%d of %d files could not be written', report.failures.length, written + report.failures.length)
      return 1
    }
    logger.success('All language files merged (%d files). Output: %s', written, config.outputDir)
    return 0
  },
}
