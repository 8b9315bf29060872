import { sortedEntries } from '../lang/json-file'
import type { MergedLanguageFile, ModuleSource } from '../lang/types'

/**
 * Fold per-module sources for one language into a single mapping.
 *
 * Sources are visited in the given order and the first module to define a
 * key owns it; later definitions of the same key are ignored. The result is
 * sorted by key, so module order only decides which value wins, never where
 * a key lands in the output.
 */
export function mergeSources(sources: readonly ModuleSource[]): MergedLanguageFile {
  const values = new Map<string, string>()
  const origins = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of source.entries) {
      if (values.has(key)) continue
      values.set(key, value)
      origins.set(key, source.module)
    }
  }

  return { entries: sortedEntries(values), origins }
}

/** Keys each module defined but lost to an earlier module. */
export function shadowedKeys(sources: readonly ModuleSource[], merged: MergedLanguageFile): Map<string, string[]> {
  const shadowed = new Map<string, string[]>()
  for (const source of sources) {
    const lost: string[] = []
    for (const key of source.entries.keys()) {
      if (merged.origins.get(key) !== source.module) lost.push(key)
    }
    if (lost.length) shadowed.set(source.module, lost)
  }
  return shadowed
}
