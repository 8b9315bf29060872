import { compareKeys, parseLanguageJson, serializeLanguageFile, serializeOrderedJson, sortedEntries } from '../json-file'

describe('parseLanguageJson', () => {
  it('reads a flat string object in file order and ignores a BOM', () => {
    const result = parseLanguageJson('\uFEFF{"b": "2", "a": "1"}')
    expect(result.ok && [...result.entries]).toEqual([
      ['b', '2'],
      ['a', '1'],
    ])
  })

  it('rejects non-object roots', () => {
    expect(parseLanguageJson('[]')).toEqual({ ok: false, reason: 'expected a JSON object' })
    expect(parseLanguageJson('"text"')).toEqual({ ok: false, reason: 'expected a JSON object' })
  })

  it('rejects nested or non-string values and names the key', () => {
    expect(parseLanguageJson('{"a": {"b": "c"}}')).toEqual({ ok: false, reason: 'expected string values at "a"' })
    expect(parseLanguageJson('{"ok": "1", "n": 2}')).toEqual({ ok: false, reason: 'expected string values at "n"' })
  })

  it('reports syntax errors', () => {
    const result = parseLanguageJson('{"a": ')
    expect(result.ok).toBe(false)
  })
})

describe('sortedEntries', () => {
  it('orders keys by code unit', () => {
    const keys = sortedEntries(
      new Map([
        ['b', '1'],
        ['B', '2'],
        ['a', '3'],
        ['10', '4'],
        ['2', '5'],
      ]),
    ).map((entry) => entry.key)
    expect(keys).toEqual(['10', '2', 'B', 'a', 'b'])
    expect(compareKeys('a', 'a')).toBe(0)
  })

  it('compares by code point, then by length', () => {
    expect(compareKeys('\u{1F600}', '\uFF01')).toBe(1)
    expect(compareKeys('\uFF01', '\u{1F600}')).toBe(-1)
    expect(compareKeys('x\u{1F600}', 'x\u{1F600}')).toBe(0)
    expect(compareKeys('ab', 'a')).toBe(1)
    expect(compareKeys('a', 'ab')).toBe(-1)
  })
})

describe('serializeOrderedJson', () => {
  it('renders an empty object on one line', () => {
    expect(serializeOrderedJson([])).toBe('{}\n')
  })

  it('keeps the given order, including integer-like keys', () => {
    expect(
      serializeOrderedJson([
        ['10', 'x'],
        ['2', 'y'],
        ['a', 'z'],
      ]),
    ).toBe('{\n  "10": "x",\n  "2": "y",\n  "a": "z"\n}\n')
  })

  it('indents nested objects', () => {
    expect(serializeOrderedJson([['k', { text: 't', crowdinContext: '' }]])).toBe(
      '{\n  "k": {\n    "text": "t",\n    "crowdinContext": ""\n  }\n}\n',
    )
  })
})

describe('serializeLanguageFile', () => {
  it('escapes quotes and control characters but not non-ASCII text', () => {
    expect(
      serializeLanguageFile([
        { key: 'say "hi"', value: 'line\nbreak' },
        { key: 'zh', value: '中文' },
      ]),
    ).toBe('{\n  "say \\"hi\\"": "line\\nbreak",\n  "zh": "中文"\n}\n')
  })
})
