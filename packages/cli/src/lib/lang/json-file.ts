import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import type { LanguageEntry, LanguageMap } from './types'

export const flatDictionarySchema = z.record(z.string(), z.string())

export type FlatDictionaryResult =
  | { ok: true; entries: LanguageMap }
  | { ok: false; reason: string }

/**
 * Validate parsed JSON as a flat string → string object. Entries keep the
 * order `JSON.parse` produced.
 */
export function toLanguageMap(raw: unknown): FlatDictionaryResult {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return { ok: false, reason: 'expected a JSON object' }
  }
  const parsed = flatDictionarySchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length ? ` at "${issue.path.map(String).join('.')}"` : ''
    return { ok: false, reason: `expected string values${where}` }
  }
  const entries = new Map<string, string>()
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') entries.set(key, value)
  }
  return { ok: true, entries }
}

export function parseLanguageJson(text: string): FlatDictionaryResult {
  let raw: unknown
  try {
    raw = JSON.parse(text.replace(/^\uFEFF/, ''))
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) }
  }
  return toLanguageMap(raw)
}

/** Code point order, so astral characters sort after the whole BMP. */
export function compareKeys(a: string, b: string): number {
  let i = 0
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0
    const right = b.codePointAt(i) ?? 0
    if (left !== right) return left < right ? -1 : 1
    i += left > 0xffff ? 2 : 1
  }
  return Math.sign(a.length - b.length)
}

export function sortedEntries(entries: LanguageMap): LanguageEntry[] {
  return [...entries.keys()].sort(compareKeys).map((key) => ({ key, value: entries.get(key) ?? '' }))
}

/**
 * Render entries as a two-space indented JSON object in exactly the given
 * order. `JSON.stringify` on an object would hoist integer-like keys.
 */
export function serializeOrderedJson(entries: Iterable<readonly [string, unknown]>): string {
  const lines: string[] = []
  for (const [key, value] of entries) {
    const rendered = JSON.stringify(value, null, 2).split('\n').join('\n  ')
    lines.push(`  ${JSON.stringify(key)}: ${rendered}`)
  }
  return lines.length === 0 ? '{}\n' : `{\n${lines.join(',\n')}\n}\n`
}

export function serializeLanguageFile(entries: readonly LanguageEntry[]): string {
  return serializeOrderedJson(entries.map((entry) => [entry.key, entry.value] as const))
}

export function writeTextFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, content, 'utf8')
}
