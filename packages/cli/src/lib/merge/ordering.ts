export type MergePattern =
  | { kind: 'literal'; name: string }
  | { kind: 'prefix'; prefix: string }

const WILDCARD = '*'

export type PatternParseResult = { ok: true; pattern: MergePattern } | { ok: false; reason: string }

/**
 * `experimental_*` matches every module starting with `experimental_`;
 * anything without `*` names one module. A `*` anywhere but the end is
 * rejected.
 */
export function parseMergePattern(raw: string): PatternParseResult {
  const value = raw.trim()
  if (!value) return { ok: false, reason: 'pattern is empty' }

  const starIndex = value.indexOf(WILDCARD)
  if (starIndex === -1) return { ok: true, pattern: { kind: 'literal', name: value } }
  if (starIndex !== value.length - 1) {
    return { ok: false, reason: `"${value}": "*" is only supported as the last character` }
  }
  return { ok: true, pattern: { kind: 'prefix', prefix: value.slice(0, -1) } }
}

export function matchesPattern(pattern: MergePattern, moduleName: string): boolean {
  switch (pattern.kind) {
    case 'literal':
      return moduleName === pattern.name
    case 'prefix':
      return moduleName.startsWith(pattern.prefix)
  }
}

export function formatPattern(pattern: MergePattern): string {
  return pattern.kind === 'literal' ? pattern.name : `${pattern.prefix}${WILDCARD}`
}

/**
 * Order modules for merging. `availableModules` is the captured natural
 * enumeration; excluded names are dropped, patterns place modules in listed
 * order (a prefix group keeps natural order), and unmatched modules follow
 * in natural order. Each module is placed once, by its first matching
 * pattern.
 */
export function resolveOrder(
  availableModules: readonly string[],
  explicitOrder: readonly MergePattern[],
  excluded: ReadonlySet<string> = new Set(),
): string[] {
  const candidates = availableModules.filter((name) => !excluded.has(name))
  const placed = new Set<string>()
  const ordered: string[] = []

  const place = (name: string) => {
    if (placed.has(name)) return
    placed.add(name)
    ordered.push(name)
  }

  for (const pattern of explicitOrder) {
    for (const name of candidates) {
      if (matchesPattern(pattern, name)) place(name)
    }
  }
  for (const name of candidates) place(name)

  return ordered
}
