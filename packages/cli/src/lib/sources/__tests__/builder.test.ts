import path from 'node:path'
import { parseConfig } from '../../config'
import { createMemorySourceStore } from '../../merge/store'
import { createCapturingLogger } from '../../testing/capture-logger'
import { buildSources } from '../builder'

describe('buildSources', () => {
  const baseDir = path.resolve('/ws')
  const config = parseConfig(
    {
      targets: [
        { name: 'release', path: 'extracted/release' },
        { name: 'beta', path: 'extracted/development', nestedSubtree: 'beta' },
      ],
    },
    baseDir,
  )

  function mergedStore() {
    return createMemorySourceStore({
      '/ws/merged/release/en_US.json': '{"a": "Apple", "b": "Say \\"hi\\""}',
      '/ws/merged/release/zh_CN.json': '{"a": "苹果"}',
    })
  }

  it('writes source JSON with context from the other languages', () => {
    const store = mergedStore()
    const report = buildSources(config, { store })

    expect(store.files.get(path.join(baseDir, 'sources', 'release', 'en_US.json'))).toBe(
      [
        '{',
        '  "a": {',
        '    "text": "Apple",',
        '    "crowdinContext": "Original Translation\\nzh_CN.json: 苹果"',
        '  },',
        '  "b": {',
        '    "text": "Say \\"hi\\"",',
        '    "crowdinContext": "Original Translation"',
        '  }',
        '}',
        '',
      ].join('\n'),
    )
    expect(report.channels[0]).toEqual({
      channel: 'release',
      status: 'written',
      outputPath: path.join(baseDir, 'sources', 'release', 'en_US.json'),
      entryCount: 2,
      contextLanguages: ['zh_CN'],
    })
  })

  it('writes TSV with quoted multi-line context', () => {
    const store = mergedStore()
    buildSources(config, { store, format: 'tsv', only: ['release'] })

    expect(store.files.get(path.join(baseDir, 'sources', 'release', 'en_US.tsv'))).toBe(
      'Key\tSource string\tContext\tTranslation\r\n' +
        'a\tApple\t"Original Translation\nzh_CN: 苹果"\r\n' +
        'b\t"Say ""hi"""\tOriginal Translation\r\n',
    )
  })

  it('skips a channel whose source language was never merged', () => {
    const { logger, lines } = createCapturingLogger()
    const report = buildSources(config, { store: mergedStore(), logger })

    expect(report.channels[1]).toEqual({ channel: 'beta', status: 'skipped', reason: 'file does not exist' })
    expect(lines).toContain(
      `⚠ [release] Failed to read ${path.join(baseDir, 'merged', 'release', 'zh_TW.json')}: file does not exist`,
    )
    expect(report.failures).toEqual([])
  })
})
