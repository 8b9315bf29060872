import fs from 'node:fs'
import path from 'node:path'
import { compareKeys, parseLanguageJson, writeTextFile } from '../lang/json-file'
import type { LanguageMap } from '../lang/types'

export type SourceReadResult =
  | { ok: true; entries: LanguageMap }
  | { ok: false; code: 'missing' | 'unreadable' | 'malformed'; reason: string }

/**
 * Filesystem access for merging. Everything the orchestrator reads or
 * writes goes through this seam so merges can run against in-memory trees.
 */
export interface SourceStore {
  /** True only for an existing directory */
  exists(dir: string): boolean
  /**
   * Immediate module directories of `dir`, captured once and sorted so the
   * natural order does not depend on how the platform enumerates entries.
   */
  listModules(dir: string): string[]
  readSource(file: string): SourceReadResult
  writeArtifact(file: string, content: string): void
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code
  return undefined
}

export function createFsSourceStore(): SourceStore {
  return {
    exists: (dir) => {
      try {
        return fs.statSync(dir).isDirectory()
      } catch (err) {
        if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') return false
        throw err
      }
    },

    listModules: (dir) => {
      if (!fs.existsSync(dir)) return []
      return fs
        .readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
        .map((entry) => entry.name)
        .sort(compareKeys)
    },

    readSource: (file) => {
      let text: string
      try {
        text = fs.readFileSync(file, 'utf8')
      } catch (err) {
        if (errorCode(err) === 'ENOENT') return { ok: false, code: 'missing', reason: 'file does not exist' }
        return { ok: false, code: 'unreadable', reason: err instanceof Error ? err.message : String(err) }
      }
      const parsed = parseLanguageJson(text)
      return parsed.ok ? parsed : { ok: false, code: 'malformed', reason: parsed.reason }
    },

    writeArtifact: (file, content) => writeTextFile(file, content),
  }
}

export type MemorySourceStore = SourceStore & {
  /** Every file in the store, keyed by absolute path, including written artifacts */
  files: Map<string, string>
}

/**
 * In-memory store. Directories exist implicitly through the files under
 * them; `dirs` adds empty ones.
 */
export function createMemorySourceStore(
  initial: Record<string, string> = {},
  dirs: string[] = [],
): MemorySourceStore {
  const files = new Map<string, string>()
  for (const [file, content] of Object.entries(initial)) files.set(path.resolve(file), content)
  const explicitDirs = new Set(dirs.map((dir) => path.resolve(dir)))

  const relativeSegments = (dir: string, file: string): string[] | null => {
    const rel = path.relative(path.resolve(dir), file)
    if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return null
    return rel.split(path.sep)
  }

  const childDirs = (dir: string): Set<string> => {
    const names = new Set<string>()
    for (const candidate of [...files.keys(), ...explicitDirs]) {
      const segments = relativeSegments(dir, candidate)
      if (!segments) continue
      const [first] = segments
      const isDir = segments.length > 1 || explicitDirs.has(candidate)
      if (first && isDir) names.add(first)
    }
    return names
  }

  return {
    files,

    exists: (dir) => {
      const resolved = path.resolve(dir)
      if (explicitDirs.has(resolved)) return true
      return [...files.keys(), ...explicitDirs].some((candidate) => relativeSegments(resolved, candidate) !== null)
    },

    listModules: (dir) => [...childDirs(dir)].filter((name) => !name.startsWith('.')).sort(compareKeys),

    readSource: (file) => {
      const text = files.get(path.resolve(file))
      if (text === undefined) return { ok: false, code: 'missing', reason: 'file does not exist' }
      const parsed = parseLanguageJson(text)
      return parsed.ok ? parsed : { ok: false, code: 'malformed', reason: parsed.reason }
    },

    writeArtifact: (file, content) => {
      files.set(path.resolve(file), content)
    },
  }
}
