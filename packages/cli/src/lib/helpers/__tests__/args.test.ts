import { parseCliArgs, buildUsage, stringArg, booleanArg } from '../args'

describe('parseCliArgs', () => {
  it('parses string values given as the next argument or with equals', () => {
    const result = parseCliArgs(['--config', 'custom.json', '--cwd=/work'])
    expect(result.args).toEqual({ config: 'custom.json', cwd: '/work' })
    expect(result.positional).toEqual([])
  })

  it('parses declared boolean flags without consuming the next argument', () => {
    const result = parseCliArgs(['--crowdin', 'en_US.lang'], { boolean: ['crowdin'] })
    expect(result.args.crowdin).toBe(true)
    expect(result.positional).toEqual(['en_US.lang'])
  })

  it('sets a declared boolean to false with --no-<name>', () => {
    const result = parseCliArgs(['--no-color'], { boolean: ['color'] })
    expect(result.args).toEqual({ color: false })
  })

  it('treats an undeclared flag without a value as true', () => {
    const result = parseCliArgs(['--dry', '--format', 'tsv'])
    expect(result.args).toEqual({ dry: true, format: 'tsv' })
  })

  it('collects repeated array flags in order', () => {
    const result = parseCliArgs(['--target', 'beta', '-t', 'preview'], {
      array: ['target'],
      alias: { t: 'target' },
    })
    expect(result.args.target).toEqual(['beta', 'preview'])
  })

  it('does not mutate array defaults', () => {
    const defaults = { target: ['release'] }
    const result = parseCliArgs(['--target', 'beta'], { array: ['target'], default: defaults })
    expect(result.args.target).toEqual(['release', 'beta'])
    expect(defaults.target).toEqual(['release'])
  })

  it('resolves aliases for short and long flags', () => {
    const result = parseCliArgs(['-c', 'a.json', '--v'], { alias: { c: 'config', v: 'verbose' }, boolean: ['verbose'] })
    expect(result.args).toEqual({ config: 'a.json', verbose: true })
  })

  it('expands combined short boolean flags', () => {
    const result = parseCliArgs(['-vq'], { boolean: ['verbose', 'quiet'], alias: { v: 'verbose', q: 'quiet' } })
    expect(result.args).toEqual({ verbose: true, quiet: true })
  })

  it('stops flag parsing at --', () => {
    const result = parseCliArgs(['in.lang', '--', '--not-a-flag'])
    expect(result.positional).toEqual(['in.lang', '--not-a-flag'])
    expect(result.args).toEqual({})
  })

  it('applies defaults and lets given flags override them', () => {
    expect(parseCliArgs([], { default: { format: 'json' } }).args).toEqual({ format: 'json' })
    expect(parseCliArgs(['--format', 'tsv'], { default: { format: 'json' } }).args).toEqual({ format: 'tsv' })
  })
})

describe('stringArg / booleanArg', () => {
  it('only return values of the matching type', () => {
    const args = { format: 'tsv', crowdin: true, target: ['beta'] }
    expect(stringArg(args, 'format')).toBe('tsv')
    expect(stringArg(args, 'crowdin')).toBeUndefined()
    expect(stringArg(args, 'target')).toBeUndefined()
    expect(booleanArg(args, 'crowdin')).toBe(true)
    expect(booleanArg(args, 'format')).toBeUndefined()
  })
})

describe('buildUsage', () => {
  it('lists positionals, string and boolean flags', () => {
    const usage = buildUsage('langmerge sources', { string: ['format'], boolean: ['crowdin'] }, ['<input>'])
    expect(usage).toBe('langmerge sources <input> [--format <value>] [--crowdin]')
  })

  it('shows just the command when it has no options', () => {
    expect(buildUsage('langmerge merge', {})).toBe('langmerge merge')
  })
})
