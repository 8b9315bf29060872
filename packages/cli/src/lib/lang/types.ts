export type LanguageEntry = {
  key: string
  value: string
}

/** Insertion-ordered key → value mapping for one language of one module. */
export type LanguageMap = ReadonlyMap<string, string>

export type ModuleSource = {
  module: string
  entries: LanguageMap
  /** File the entries were read from, when they came from disk */
  file?: string
}

export type MergedLanguageFile = {
  /** Sorted by key */
  entries: LanguageEntry[]
  /** Module that supplied the winning value of each key */
  origins: ReadonlyMap<string, string>
}
