import fs from 'node:fs'
import path from 'node:path'
import { normalizeTree } from '../lib/lang/normalize'
import type { CliCommand } from '../registry'

export const normalizeCommand: CliCommand = {
  command: 'normalize',
  summary: 'Clean extracted .lang files and write the JSON merge sources next to them',
  positional: ['<dir>'],
  options: {
    array: ['lang'],
    alias: { l: 'lang' },
  },
  run: ({ args, positional, cwd, logger, loadConfig }) => {
    const [dir] = positional
    if (!dir) {
      logger.error('Usage: langmerge normalize <dir> [--lang <tag>]...')
      return 1
    }
    const root = path.resolve(cwd, dir)
    if (!fs.existsSync(root)) {
      logger.error('Directory does not exist: %s', root)
      return 1
    }

    const languages = Array.isArray(args.lang) ? args.lang : loadConfig().config.languages
    const written = normalizeTree(root, languages, { logger })
    if (written.length === 0) {
      logger.warn('No %s files found under %s', languages.map((l) => `${l}.lang`).join(', '), root)
      return 0
    }
    logger.success('Normalized %d files', written.length)
    return 0
  },
}
