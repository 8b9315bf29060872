import path from 'node:path'
import { booleanArg } from '../lib/helpers'
import { convertFile } from '../lib/lang/convert'
import type { CliCommand } from '../registry'

export const convertCommand: CliCommand = {
  command: 'convert',
  summary: 'Convert a single file between .lang, flat JSON and translation-platform source JSON',
  positional: ['<input>', '[output]'],
  options: {
    boolean: ['crowdin'],
  },
  run: ({ args, positional, cwd, logger }) => {
    const [input, output] = positional
    if (!input) {
      logger.error('Usage: langmerge convert <input> [output] [--crowdin]')
      return 1
    }

    const result = convertFile(path.resolve(cwd, input), {
      output: output ? path.resolve(cwd, output) : undefined,
      crowdin: booleanArg(args, 'crowdin') ?? false,
    })
    logger.success('Converted %s to %s (%d entries)', result.input, result.output, result.entryCount)
    return 0
  },
}
