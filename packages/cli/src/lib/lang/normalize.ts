import fs from 'node:fs'
import path from 'node:path'
import { globSync } from 'glob'
import { silentLogger, type CliLogger } from '../helpers/logger'
import { compareKeys, serializeOrderedJson, writeTextFile } from './json-file'
import { cleanLangContent, parseLang } from './parser'

export type NormalizedFile = {
  langFile: string
  jsonFile: string
  entryCount: number
  /** Keys the raw file defined more than once */
  duplicates: string[]
}

export interface NormalizeOptions {
  logger?: CliLogger
}

/**
 * Turn an extracted tree of `<module>/<languageTag>.lang` files into merge
 * sources: each file is cleaned in place and a `<languageTag>.json` with the
 * same entries, in file order, is written next to it. Files left empty by
 * cleaning are skipped.
 */
export function normalizeTree(root: string, languages: readonly string[], options: NormalizeOptions = {}): NormalizedFile[] {
  const logger = options.logger ?? silentLogger
  const wanted = new Set(languages.map((language) => `${language}.lang`))

  const langFiles = globSync('**/*.lang', {
    cwd: root,
    nodir: true,
    posix: true,
    ignore: ['**/node_modules/**'],
  })
    .filter((rel) => wanted.has(path.posix.basename(rel)))
    .sort(compareKeys)

  const written: NormalizedFile[] = []
  for (const rel of langFiles) {
    const langFile = path.join(root, ...rel.split('/'))
    const raw = fs.readFileSync(langFile, 'utf8')
    const cleaned = cleanLangContent(raw)
    if (!cleaned) {
      logger.debug('Skipping empty %s', rel)
      continue
    }

    const { duplicates } = parseLang(raw)
    if (duplicates.length) {
      logger.warn('%s: dropped %d duplicate keys (first definition kept)', rel, duplicates.length)
    }

    const { entries } = parseLang(cleaned)
    const jsonFile = langFile.replace(/\.lang$/, '.json')
    writeTextFile(langFile, cleaned)
    writeTextFile(jsonFile, serializeOrderedJson(entries))
    logger.info('Created %s with %d entries', rel.replace(/\.lang$/, '.json'), entries.size)

    written.push({ langFile, jsonFile, entryCount: entries.size, duplicates })
  }

  return written
}
