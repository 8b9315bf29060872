import type { ResolvedConfig } from '../lib/config'

export function unknownTargets(config: ResolvedConfig, only: readonly string[] | undefined): string[] {
  if (!only) return []
  const known = new Set(config.targets.map((t) => t.name))
  return only.filter((name) => !known.has(name))
}
