import path from 'node:path'
import type { ResolvedConfig } from '../config'
import { OutputWriteError } from '../errors'
import { silentLogger, type CliLogger } from '../helpers/logger'
import { serializeOrderedJson } from '../lang/json-file'
import type { LanguageMap } from '../lang/types'
import { languageFileName } from '../merge/collector'
import { outputPathFor } from '../merge/orchestrator'
import { createFsSourceStore, type SourceStore } from '../merge/store'

export type SourceFormat = 'json' | 'tsv'

export const SOURCE_FORMATS: readonly SourceFormat[] = ['json', 'tsv']

export const ORIGINAL_TRANSLATION_CONTEXT = 'Original Translation'

const TSV_HEADER = ['Key', 'Source string', 'Context', 'Translation']
const TSV_LINE_END = '\r\n'

export type SourceChannelOutcome =
  | { channel: string; status: 'written'; outputPath: string; entryCount: number; contextLanguages: string[] }
  | { channel: string; status: 'skipped'; reason: string }
  | { channel: string; status: 'failed'; outputPath: string; error: OutputWriteError }

export type SourcesReport = {
  channels: SourceChannelOutcome[]
  failures: OutputWriteError[]
}

export interface BuildSourcesOptions {
  format?: SourceFormat
  store?: SourceStore
  logger?: CliLogger
  only?: readonly string[]
}

type ContextTranslations = Array<{ language: string; entries: LanguageMap }>

function escapeTsv(value: string): string {
  if (/[\t"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function renderJsonSource(source: LanguageMap, translations: ContextTranslations): string {
  const rows: Array<[string, { text: string; crowdinContext: string }]> = []
  for (const [key, text] of source) {
    let context = ORIGINAL_TRANSLATION_CONTEXT
    for (const { language, entries } of translations) {
      const value = entries.get(key)
      if (value !== undefined) context += `\n${languageFileName(language)}: ${value}`
    }
    rows.push([key, { text, crowdinContext: context }])
  }
  return serializeOrderedJson(rows)
}

export function renderTsvSource(source: LanguageMap, translations: ContextTranslations): string {
  const lines = [TSV_HEADER.map(escapeTsv).join('\t')]
  for (const [key, text] of source) {
    const context = [ORIGINAL_TRANSLATION_CONTEXT]
    for (const { language, entries } of translations) {
      const value = entries.get(key)
      if (value !== undefined) context.push(`${language}: ${value}`)
    }
    lines.push([key, text, context.join('\n')].map(escapeTsv).join('\t'))
  }
  return lines.map((line) => line + TSV_LINE_END).join('')
}

/**
 * Write translation-platform source files for each merged channel: the
 * source language's strings, with what the context languages currently say
 * attached as translator context.
 */
export function buildSources(config: ResolvedConfig, options: BuildSourcesOptions = {}): SourcesReport {
  const format = options.format ?? 'json'
  const store = options.store ?? createFsSourceStore()
  const logger = options.logger ?? silentLogger
  const targets = options.only ? config.targets.filter((t) => options.only?.includes(t.name)) : config.targets

  const channels: SourceChannelOutcome[] = []
  const failures: OutputWriteError[] = []

  for (const target of targets) {
    const log = logger.forModule(target.name)
    const sourcePath = outputPathFor(config, target.name, config.sourceLanguage)
    const source = store.readSource(sourcePath)
    if (!source.ok) {
      log.warn('Failed to read %s: %s', sourcePath, source.reason)
      channels.push({ channel: target.name, status: 'skipped', reason: source.reason })
      continue
    }
    log.info('Loaded %d entries from %s', source.entries.size, languageFileName(config.sourceLanguage))

    const translations: ContextTranslations = []
    for (const language of config.contextLanguages) {
      const contextPath = outputPathFor(config, target.name, language)
      const result = store.readSource(contextPath)
      if (!result.ok) {
        log.warn('Failed to read %s: %s', contextPath, result.reason)
        continue
      }
      log.debug('Loaded %d entries from %s', result.entries.size, languageFileName(language))
      translations.push({ language, entries: result.entries })
    }

    const outputPath = path.join(config.sourcesDir, target.name, `${config.sourceLanguage}.${format}`)
    const content =
      format === 'tsv' ? renderTsvSource(source.entries, translations) : renderJsonSource(source.entries, translations)

    try {
      store.writeArtifact(outputPath, content)
    } catch (err) {
      const error = new OutputWriteError(outputPath, err)
      log.error(error.message)
      channels.push({ channel: target.name, status: 'failed', outputPath, error })
      failures.push(error)
      continue
    }

    log.success('Created %s with %d entries', outputPath, source.entries.size)
    channels.push({
      channel: target.name,
      status: 'written',
      outputPath,
      entryCount: source.entries.size,
      contextLanguages: translations.map((t) => t.language),
    })
  }

  return { channels, failures }
}
