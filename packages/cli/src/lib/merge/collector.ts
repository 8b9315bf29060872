import path from 'node:path'
import type { ResolvedTarget } from '../config'
import { silentLogger, type CliLogger } from '../helpers/logger'
import type { ModuleSource } from '../lang/types'
import { resolveOrder, type MergePattern } from './ordering'
import type { SourceStore } from './store'

export function moduleDir(root: string, moduleName: string): string {
  return path.join(root, ...moduleName.split('/'))
}

export function languageFileName(language: string): string {
  return `${language}.json`
}

/**
 * Final module order for a target: top-level modules first, then the
 * modules of its nested subtree as `<subtree>/<module>`. The nested subtree
 * and every excluded subtree stay out of the top-level pass.
 */
export function collectModuleOrder(
  store: SourceStore,
  target: ResolvedTarget,
  patterns: readonly MergePattern[],
): string[] {
  const excluded = new Set(target.excludedSubtrees)
  if (target.nestedSubtree) excluded.add(target.nestedSubtree)

  const ordered = resolveOrder(store.listModules(target.root), patterns, excluded)

  if (target.nestedSubtree) {
    const nestedRoot = path.join(target.root, target.nestedSubtree)
    if (store.exists(nestedRoot)) {
      for (const name of resolveOrder(store.listModules(nestedRoot), patterns)) {
        ordered.push(`${target.nestedSubtree}/${name}`)
      }
    }
  }

  return ordered
}

/**
 * Read one language of every module, keeping module order. Modules without
 * the file contribute nothing; unreadable or malformed files are reported
 * and treated the same way.
 */
export function collectSources(
  store: SourceStore,
  root: string,
  modules: readonly string[],
  language: string,
  logger: CliLogger = silentLogger,
): ModuleSource[] {
  const sources: ModuleSource[] = []

  for (const moduleName of modules) {
    const file = path.join(moduleDir(root, moduleName), languageFileName(language))
    const result = store.readSource(file)
    if (result.ok) {
      sources.push({ module: moduleName, entries: result.entries, file })
      continue
    }
    if (result.code !== 'missing') {
      logger.warn('Failed to read %s: %s', file, result.reason)
    }
  }

  return sources
}
