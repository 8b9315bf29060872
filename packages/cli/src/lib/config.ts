import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors'
import { parseMergePattern, type MergePattern } from './merge/ordering'

export const CONFIG_FILE_NAME = 'langmerge.config.json'

export const DEFAULT_MERGE_ORDER = [
  'vanilla',
  'experimental_*',
  'oreui',
  'persona',
  'editor',
  'chemistry',
  'education',
  'education_demo',
]

export const DEFAULT_TARGETS: TargetConfig[] = [
  { name: 'release', path: 'extracted/release', excludedSubtrees: [] },
  { name: 'beta', path: 'extracted/development', excludedSubtrees: ['previewapp'], nestedSubtree: 'beta' },
  { name: 'preview', path: 'extracted/development', excludedSubtrees: ['beta'], nestedSubtree: 'previewapp' },
]

export const DEFAULT_LANGUAGES = ['en_US', 'zh_CN', 'zh_TW']

const segmentSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !/[\\/]/.test(value) && value !== '.' && value !== '..', {
    message: 'must be a single path segment',
  })

const languageTagSchema = z
  .string()
  .trim()
  .transform((tag) => tag.replace(/\.json$/i, ''))
  .pipe(segmentSchema)

const targetSchema = z.object({
  name: segmentSchema,
  path: z.string().trim().min(1),
  excludedSubtrees: z.array(segmentSchema).default([]),
  nestedSubtree: segmentSchema.optional(),
})

export const langMergeConfigSchema = z
  .object({
    mergeOrder: z
      .array(z.string())
      .default(DEFAULT_MERGE_ORDER)
      .superRefine((patterns, ctx) => {
        patterns.forEach((raw, index) => {
          const parsed = parseMergePattern(raw)
          if (!parsed.ok) ctx.addIssue({ code: 'custom', message: parsed.reason, path: [index] })
        })
      }),
    targets: z.array(targetSchema).default(DEFAULT_TARGETS),
    langFiles: z.array(languageTagSchema).default(DEFAULT_LANGUAGES),
    outputDir: z.string().trim().min(1).default('merged'),
    sourcesDir: z.string().trim().min(1).default('sources'),
    sourceLanguage: languageTagSchema.default('en_US'),
    contextLanguages: z.array(languageTagSchema).default(['zh_CN', 'zh_TW']),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.targets.forEach((target, index) => {
      if (seen.has(target.name)) {
        ctx.addIssue({ code: 'custom', message: `duplicate target "${target.name}"`, path: ['targets', index, 'name'] })
      }
      seen.add(target.name)
    })
  })

export type TargetConfig = z.infer<typeof targetSchema>
export type LangMergeConfigInput = z.input<typeof langMergeConfigSchema>

export type ResolvedTarget = {
  name: string
  /** Absolute channel root */
  root: string
  excludedSubtrees: string[]
  nestedSubtree?: string
}

export type ResolvedConfig = {
  baseDir: string
  mergeOrder: MergePattern[]
  targets: ResolvedTarget[]
  languages: string[]
  outputDir: string
  sourcesDir: string
  sourceLanguage: string
  contextLanguages: string[]
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length ? issue.path.map(String).join('.') : '(root)'
    return `${where}: ${issue.message}`
  })
}

/** Validate a raw config object and resolve its paths against `baseDir`. */
export function parseConfig(raw: unknown, baseDir: string, source = 'inline config'): ResolvedConfig {
  const parsed = langMergeConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) throw new ConfigError(source, formatIssues(parsed.error))
  const config = parsed.data

  const mergeOrder: MergePattern[] = []
  for (const pattern of config.mergeOrder) {
    const result = parseMergePattern(pattern)
    if (result.ok) mergeOrder.push(result.pattern)
  }

  return {
    baseDir,
    mergeOrder,
    targets: config.targets.map((target) => ({
      name: target.name,
      root: path.resolve(baseDir, target.path),
      excludedSubtrees: [...new Set(target.excludedSubtrees)],
      ...(target.nestedSubtree ? { nestedSubtree: target.nestedSubtree } : {}),
    })),
    languages: [...new Set(config.langFiles)],
    outputDir: path.resolve(baseDir, config.outputDir),
    sourcesDir: path.resolve(baseDir, config.sourcesDir),
    sourceLanguage: config.sourceLanguage,
    contextLanguages: [...new Set(config.contextLanguages)],
  }
}

export interface LoadConfigOptions {
  /** Base directory for relative paths and the default config file */
  cwd?: string
  /** Explicit config file; unlike the default one it must exist */
  configPath?: string
}

export type LoadedConfig = {
  config: ResolvedConfig
  /** Config file that was read, or null when defaults were used */
  file: string | null
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = path.resolve(options.cwd ?? process.cwd())
  const file = options.configPath ? path.resolve(cwd, options.configPath) : path.join(cwd, CONFIG_FILE_NAME)

  if (!fs.existsSync(file)) {
    if (options.configPath) throw new ConfigError(file, ['file does not exist'])
    return { config: parseConfig({}, cwd, 'defaults'), file: null }
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (err) {
    throw new ConfigError(file, [err instanceof Error ? err.message : String(err)])
  }
  return { config: parseConfig(raw, cwd, file), file }
}
