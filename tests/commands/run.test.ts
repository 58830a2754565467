// tests/commands/run.test.ts
import { describe, it, expect } from 'vitest'
import { toRunOptions } from '../../src/commands/run.js'
import { validateRunOptions } from '../../src/runner/run.js'
import { UsageError } from '../../src/utils/errors.js'

describe('toRunOptions', () => {
  it('should apply defaults', () => {
    expect(toRunOptions({ config: 'depsum.yaml', statsSort: 'count' })).toEqual({
      config: 'depsum.yaml',
      verbose: false,
      inputFiles: [],
      printDepStats: false,
      printRevDepStats: false,
      statsSort: 'count',
      outDepHashes: undefined,
      outRelations: undefined,
      outRecursiveDeps: undefined,
      outRecursiveDepsFor: undefined,
      hashSalt: '',
      showProgress: true
    })
  })

  it('should split comma separated input files', () => {
    const options = toRunOptions({ config: 'c.yaml', statsSort: 'name', inputFiles: 'tests/a.py,tests/b.py' })
    expect(options.inputFiles).toEqual(['tests/a.py', 'tests/b.py'])
    expect(options.statsSort).toBe('name')
  })

  it('should reject an unknown sort mode', () => {
    expect(() => toRunOptions({ config: 'c.yaml', statsSort: 'size' })).toThrow('invalid stats-sort value: size')
  })
})

describe('validateRunOptions', () => {
  it('should require a config path', () => {
    expect(() => validateRunOptions({ config: '' })).toThrow(UsageError)
  })

  it('should require both recursive dependency options together', () => {
    expect(() => validateRunOptions({ config: 'c.yaml', outRecursiveDeps: 'out.json' }))
      .toThrow('both --out-recursive-deps and --out-recursive-deps-for must be specified together')
    expect(() => validateRunOptions({ config: 'c.yaml', outRecursiveDepsFor: 'tests/a.py' })).toThrow(UsageError)
    expect(() => validateRunOptions({ config: 'c.yaml', outRecursiveDeps: 'o.json', outRecursiveDepsFor: 'a.py' }))
      .not.toThrow()
  })
})
