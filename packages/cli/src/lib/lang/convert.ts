import fs from 'node:fs'
import path from 'node:path'
import { ConversionError } from '../errors'
import { parseLanguageJson, serializeOrderedJson, sortedEntries, writeTextFile } from './json-file'
import { cleanLangContent, parseLang, serializeLang } from './parser'
import type { LanguageMap } from './types'

export type ConversionKind = 'lang-to-json' | 'json-to-lang' | 'lang-to-crowdin' | 'json-to-crowdin'

export interface ConvertOptions {
  output?: string
  /** Produce translation-platform source JSON instead of the plain counterpart */
  crowdin?: boolean
}

export type ConversionResult = {
  kind: ConversionKind
  input: string
  output: string
  entryCount: number
}

export type CrowdinSourceEntry = {
  text: string
  crowdinContext: string
}

export function toCrowdinSource(entries: LanguageMap): Array<[string, CrowdinSourceEntry]> {
  return [...entries].map(([key, text]): [string, CrowdinSourceEntry] => [key, { text, crowdinContext: '' }])
}

function crowdinPathFor(input: string): string {
  const ext = path.extname(input)
  return path.join(path.dirname(input), `${path.basename(input, ext)}.crowdin.json`)
}

function swapExtension(input: string, ext: string): string {
  return path.join(path.dirname(input), `${path.basename(input, path.extname(input))}${ext}`)
}

function readLang(input: string): LanguageMap {
  return parseLang(cleanLangContent(fs.readFileSync(input, 'utf8'))).entries
}

function readJson(input: string): LanguageMap {
  const parsed = parseLanguageJson(fs.readFileSync(input, 'utf8'))
  if (!parsed.ok) throw new ConversionError(input, `Cannot convert ${input}: ${parsed.reason}`)
  return parsed.entries
}

/**
 * Convert one file by extension: `.lang` becomes sorted flat JSON, `.json`
 * becomes `.lang`; with `crowdin` either one becomes translation-platform
 * source JSON in file order.
 */
export function convertFile(input: string, options: ConvertOptions = {}): ConversionResult {
  if (!fs.existsSync(input)) {
    throw new ConversionError(input, `Input file '${input}' does not exist`)
  }

  const ext = path.extname(input).toLowerCase()
  if (ext !== '.lang' && ext !== '.json') {
    throw new ConversionError(input, `Unsupported file extension '${path.extname(input)}' (supported: .lang, .json)`)
  }

  const entries = ext === '.lang' ? readLang(input) : readJson(input)

  if (options.crowdin) {
    const output = options.output ?? crowdinPathFor(input)
    writeTextFile(output, serializeOrderedJson(toCrowdinSource(entries)))
    return { kind: ext === '.lang' ? 'lang-to-crowdin' : 'json-to-crowdin', input, output, entryCount: entries.size }
  }

  if (ext === '.lang') {
    const output = options.output ?? swapExtension(input, '.json')
    const sorted = sortedEntries(entries).map((entry) => [entry.key, entry.value] as const)
    writeTextFile(output, serializeOrderedJson(sorted))
    return { kind: 'lang-to-json', input, output, entryCount: entries.size }
  }

  const output = options.output ?? swapExtension(input, '.lang')
  writeTextFile(output, serializeLang(entries))
  return { kind: 'json-to-lang', input, output, entryCount: entries.size }
}
