import path from 'node:path'
import type { ResolvedTarget } from '../../config'
import { createCapturingLogger } from '../../testing/capture-logger'
import { collectModuleOrder, collectSources } from '../collector'
import { parseMergePattern, type MergePattern } from '../ordering'
import { createMemorySourceStore } from '../store'

const order: MergePattern[] = ['vanilla', 'experimental_*', 'oreui'].flatMap((raw) => {
  const parsed = parseMergePattern(raw)
  return parsed.ok ? [parsed.pattern] : []
})

const devRoot = path.resolve('/ws/extracted/development')

function target(overrides: Partial<ResolvedTarget>): ResolvedTarget {
  return { name: 'beta', root: devRoot, excludedSubtrees: [], ...overrides }
}

describe('collectModuleOrder', () => {
  const store = createMemorySourceStore({
    '/ws/extracted/development/oreui/en_US.json': '{}',
    '/ws/extracted/development/vanilla/en_US.json': '{}',
    '/ws/extracted/development/experimental_cameras/en_US.json': '{}',
    '/ws/extracted/development/beta/oreui/en_US.json': '{}',
    '/ws/extracted/development/beta/vanilla/en_US.json': '{}',
    '/ws/extracted/development/previewapp/vanilla/en_US.json': '{}',
  })

  it('appends the nested subtree after the top-level modules and leaves excluded subtrees out', () => {
    const modules = collectModuleOrder(
      store,
      target({ excludedSubtrees: ['previewapp'], nestedSubtree: 'beta' }),
      order,
    )
    expect(modules).toEqual(['vanilla', 'experimental_cameras', 'oreui', 'beta/vanilla', 'beta/oreui'])
  })

  it('never treats the nested subtree as a top-level module', () => {
    const modules = collectModuleOrder(
      store,
      target({ name: 'preview', excludedSubtrees: ['beta'], nestedSubtree: 'previewapp' }),
      order,
    )
    expect(modules).toEqual(['vanilla', 'experimental_cameras', 'oreui', 'previewapp/vanilla'])
  })

  it('skips a nested subtree that does not exist', () => {
    const modules = collectModuleOrder(store, target({ nestedSubtree: 'nightly', excludedSubtrees: ['beta', 'previewapp'] }), order)
    expect(modules).toEqual(['vanilla', 'experimental_cameras', 'oreui'])
  })
})

describe('collectSources', () => {
  it('reads one language per module in order and skips modules without it', () => {
    const store = createMemorySourceStore({
      '/ws/extracted/development/vanilla/en_US.json': '{"a": "vanilla"}',
      '/ws/extracted/development/beta/vanilla/en_US.json': '{"a": "beta"}',
    })
    const sources = collectSources(store, devRoot, ['oreui', 'vanilla', 'beta/vanilla'], 'en_US')

    expect(sources).toEqual([
      {
        module: 'vanilla',
        entries: new Map([['a', 'vanilla']]),
        file: path.join(devRoot, 'vanilla', 'en_US.json'),
      },
      {
        module: 'beta/vanilla',
        entries: new Map([['a', 'beta']]),
        file: path.join(devRoot, 'beta', 'vanilla', 'en_US.json'),
      },
    ])
  })

  it('warns about malformed files and leaves them out', () => {
    const store = createMemorySourceStore({
      '/ws/extracted/development/vanilla/en_US.json': '{"a": 1}',
      '/ws/extracted/development/oreui/en_US.json': '{"b": "2"}',
    })
    const { logger, lines } = createCapturingLogger()
    const sources = collectSources(store, devRoot, ['vanilla', 'oreui'], 'en_US', logger)

    expect(sources.map((s) => s.module)).toEqual(['oreui'])
    expect(lines).toEqual([
      `⚠ Failed to read ${path.join(devRoot, 'vanilla', 'en_US.json')}: expected string values at "a"`,
    ])
  })
})
