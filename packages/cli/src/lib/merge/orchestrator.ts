import path from 'node:path'
import type { ResolvedConfig, ResolvedTarget } from '../config'
import { OutputWriteError } from '../errors'
import { silentLogger, type CliLogger } from '../helpers/logger'
import { serializeLanguageFile } from '../lang/json-file'
import { collectModuleOrder, collectSources, languageFileName } from './collector'
import { mergeSources, shadowedKeys } from './engine'
import { createFsSourceStore, type SourceStore } from './store'

export type LanguageOutcome =
  | {
      language: string
      status: 'merged'
      outputPath: string
      /** Files that were merged, in precedence order */
      sourceFiles: string[]
      keyCount: number
    }
  | { language: string; status: 'skipped'; reason: 'no-sources' }
  | { language: string; status: 'failed'; outputPath: string; error: OutputWriteError }

export type ChannelReport = {
  channel: string
  root: string
  /** `unreadable`: the root exists but could not be listed */
  status: 'processed' | 'missing' | 'unreadable'
  /** Resolved module order; empty unless processed */
  modules: string[]
  languages: LanguageOutcome[]
}

export type MergeReport = {
  channels: ChannelReport[]
  failures: OutputWriteError[]
}

export interface MergeChannelsOptions {
  store?: SourceStore
  logger?: CliLogger
  /** Restrict the run to these target names */
  only?: readonly string[]
}

export function outputPathFor(config: ResolvedConfig, channel: string, language: string): string {
  return path.join(config.outputDir, channel, languageFileName(language))
}

function mergeChannel(
  config: ResolvedConfig,
  target: ResolvedTarget,
  store: SourceStore,
  logger: CliLogger,
): ChannelReport {
  let modules: string[]
  try {
    if (!store.exists(target.root)) {
      logger.info('Source directory does not exist: %s', target.root)
      return { channel: target.name, root: target.root, status: 'missing', modules: [], languages: [] }
    }
    modules = collectModuleOrder(store, target, config.mergeOrder)
  } catch (err) {
    logger.warn('Cannot read source directory %s: %s', target.root, err instanceof Error ? err.message : String(err))
    return { channel: target.name, root: target.root, status: 'unreadable', modules: [], languages: [] }
  }
  logger.debug('Module order: %s', modules.join(', ') || '(none)')

  const languages: LanguageOutcome[] = []
  for (const language of config.languages) {
    const sources = collectSources(store, target.root, modules, language, logger)
    if (sources.length === 0) {
      logger.warn('No files found for %s in %s', languageFileName(language), target.name)
      languages.push({ language, status: 'skipped', reason: 'no-sources' })
      continue
    }

    const merged = mergeSources(sources)
    const outputPath = outputPathFor(config, target.name, language)
    const sourceFiles = sources.map((source) => source.file ?? source.module)

    try {
      store.writeArtifact(outputPath, serializeLanguageFile(merged.entries))
    } catch (err) {
      const error = new OutputWriteError(outputPath, err)
      logger.error(error.message)
      languages.push({ language, status: 'failed', outputPath, error })
      continue
    }

    logger.success('Merged %d files to %s', sourceFiles.length, outputPath)
    logger.info('  Total keys: %d', merged.entries.length)
    logger.debug('  Files merged:')
    for (const file of sourceFiles) logger.debug('    %s', file)
    for (const [module, keys] of shadowedKeys(sources, merged)) {
      logger.debug('  %s: %d keys already defined by an earlier module', module, keys.length)
    }
    languages.push({ language, status: 'merged', outputPath, sourceFiles, keyCount: merged.entries.length })
  }

  return { channel: target.name, root: target.root, status: 'processed', modules, languages }
}

/**
 * Merge every configured target × language. Each pair is independent: a
 * missing or unreadable channel, a language without sources or a failed
 * write is recorded and the run continues.
 */
export function mergeChannels(config: ResolvedConfig, options: MergeChannelsOptions = {}): MergeReport {
  const store = options.store ?? createFsSourceStore()
  const logger = options.logger ?? silentLogger
  const targets = options.only ? config.targets.filter((t) => options.only?.includes(t.name)) : config.targets

  const channels: ChannelReport[] = []
  const failures: OutputWriteError[] = []

  for (const target of targets) {
    logger.info('Processing target: %s', target.name)
    const report = mergeChannel(config, target, store, logger.forModule(target.name))
    for (const outcome of report.languages) {
      if (outcome.status === 'failed') failures.push(outcome.error)
    }
    channels.push(report)
  }

  return { channels, failures }
}
