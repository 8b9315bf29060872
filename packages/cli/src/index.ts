export { run } from './langmerge'
export * from './lib/config'
export * from './lib/errors'
export { mergeSources, shadowedKeys } from './lib/merge/engine'
export { resolveOrder, parseMergePattern, matchesPattern, formatPattern, type MergePattern } from './lib/merge/ordering'
export { collectModuleOrder, collectSources } from './lib/merge/collector'
export { mergeChannels, type MergeReport, type ChannelReport, type LanguageOutcome } from './lib/merge/orchestrator'
export { createFsSourceStore, createMemorySourceStore, type SourceStore } from './lib/merge/store'
export { parseLang, serializeLang, cleanLangContent, removeDuplicateKeys } from './lib/lang/parser'
export { serializeLanguageFile } from './lib/lang/json-file'
export { normalizeTree } from './lib/lang/normalize'
export { convertFile } from './lib/lang/convert'
export { buildSources, type SourceFormat } from './lib/sources/builder'
export type { LanguageEntry, LanguageMap, ModuleSource, MergedLanguageFile } from './lib/lang/types'
