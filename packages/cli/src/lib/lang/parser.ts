import type { LanguageMap } from './types'

/**
 * `.lang` files are line oriented: `key=value`, `##` starts a comment line.
 * Only ASCII whitespace is trimmed from lines and values, so a value that
 * starts or ends with a no-break space (U+00A0) keeps it.
 */

const ASCII_EDGE_WHITESPACE = /^[ \t\r\n\f\v]+|[ \t\r\n\f\v]+$/g
const ASCII_TRAILING_WHITESPACE = /[ \t\r\n\f\v]+$/
const COMMENT_PREFIX = '##'
const INLINE_COMMENT = '\t#'

export function trimAsciiWhitespace(value: string): string {
  return value.replace(ASCII_EDGE_WHITESPACE, '')
}

/** `Chat\t# tab title` keeps only `Chat`. */
function stripInlineComment(value: string): string {
  const index = value.indexOf(INLINE_COMMENT)
  return index === -1 ? value : value.slice(0, index).replace(ASCII_TRAILING_WHITESPACE, '')
}

function splitLines(content: string): string[] {
  return content.split(/\r\n|\r|\n/)
}

function isCommentOrBlank(trimmedLine: string): boolean {
  return trimmedLine.length === 0 || trimmedLine.startsWith(COMMENT_PREFIX)
}

/** Key of a `key=value` line, or null for lines that define nothing. */
function keyOf(trimmedLine: string): string | null {
  const equalIndex = trimmedLine.indexOf('=')
  if (equalIndex <= 0) return null
  const key = trimmedLine.slice(0, equalIndex).trim()
  return key.length > 0 ? key : null
}

/**
 * Drop every line that redefines a key seen on an earlier line. Comments,
 * blank lines and lines without a key are kept untouched.
 */
export function removeDuplicateKeys(content: string): string {
  const seen = new Set<string>()
  const kept: string[] = []

  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    const key = isCommentOrBlank(trimmed) ? null : keyOf(trimmed)
    if (key === null) {
      kept.push(line)
      continue
    }
    if (seen.has(key)) continue
    seen.add(key)
    kept.push(line)
  }

  return kept.join('\n')
}

/**
 * Normalize raw file content: drop the BOM, use LF line endings, remove
 * blank lines and duplicate keys. Returns '' when no content remains.
 */
export function cleanLangContent(raw: string): string {
  const normalized = raw.replace(/\uFEFF/g, '').replace(/\r\n?/g, '\n')
  const nonBlank = normalized
    .split('\n')
    .filter((line) => trimAsciiWhitespace(line).length > 0)
    .join('\n')

  if (nonBlank.trim().length === 0) return ''
  return removeDuplicateKeys(nonBlank)
}

export type ParsedLang = {
  entries: LanguageMap
  /** Keys defined more than once; only their first value was kept */
  duplicates: string[]
}

export function parseLang(content: string): ParsedLang {
  const entries = new Map<string, string>()
  const duplicates = new Set<string>()

  for (const rawLine of splitLines(content)) {
    const line = trimAsciiWhitespace(rawLine)
    if (isCommentOrBlank(line)) continue

    const key = keyOf(line)
    if (key === null) continue

    if (entries.has(key)) {
      duplicates.add(key)
      continue
    }
    entries.set(key, stripInlineComment(trimAsciiWhitespace(line.slice(line.indexOf('=') + 1))))
  }

  return { entries, duplicates: [...duplicates] }
}

export function serializeLang(entries: Iterable<readonly [string, string]>): string {
  const lines: string[] = []
  for (const [key, value] of entries) {
    lines.push(`${key}=${value}`)
  }
  return lines.join('\n')
}
