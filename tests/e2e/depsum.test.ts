// tests/e2e/depsum.test.ts
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { readFile, appendFile, writeFile } from 'fs/promises'
import { createHash } from 'crypto'
import { join } from 'path'
import { runDepsum } from '../../src/runner/run.js'
import { computeDependencyHash } from '../../src/hasher/hash.js'
import type { RunOptions } from '../../src/runner/types.js'
import { makeTree, removeTree } from '../helpers/tree.js'

const CONFIG = `base_dir: "."
inputs: "tests/**/test_*.py"
global_deps: "poetry.lock"
root_python_packages: ["pkg"]
path_rules:
  "tests/**/test_*.py":
    visit_grand_siblings: ["conftest.py", "__init__.py"]
  "**/*.py":
    visit_imported_python_modules: true
`

const FILES: Record<string, string> = {
  'depsum.yaml': CONFIG,
  'poetry.lock': 'lock',
  'conftest.py': 'root',
  'tests/__init__.py': '',
  'tests/conftest.py': 'fixtures',
  'tests/test_foo.py': 'import pkg.db\nimport pkg.util\n',
  'tests/test_bar.py': 'from pkg import util\n',
  'pkg/__init__.py': '',
  'pkg/db.py': 'db',
  'pkg/util.py': 'util',
  'docs/readme.md': 'unrelated'
}

const sha = (data: string) => createHash('sha256').update(data).digest()

describe('depsum end to end', () => {
  let root: string
  let stderr: MockInstance<typeof console.error>

  const run = (options: Partial<RunOptions> = {}) =>
    runDepsum({ config: join(root, 'depsum.yaml'), showProgress: false, ...options })

  beforeEach(async () => {
    root = await makeTree(FILES)
    stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    stderr.mockRestore()
    await removeTree(root)
  })

  it('should build relations for every reachable file', async () => {
    const result = await run()

    expect(result.inputFiles).toEqual(['tests/test_bar.py', 'tests/test_foo.py'])
    expect(result.graph?.relations.get('tests/test_foo.py')).toEqual([
      'pkg/__init__.py',
      'pkg/db.py',
      'pkg/util.py',
      'poetry.lock',
      'tests/__init__.py',
      'tests/conftest.py'
    ])
    expect(result.graph?.relations.get('pkg/db.py')).toEqual(['poetry.lock'])
    expect(result.graph?.visited.has('conftest.py')).toBe(false)
    expect(result.graph?.visited.has('docs/readme.md')).toBe(false)
    expect(result.depHashes.size).toBe(0)
  })

  it('should compute digests over the closure contents', async () => {
    const result = await run({ outDepHashes: join(root, 'hashes.json'), hashSalt: 'v2' })

    const closure = [
      'pkg/__init__.py',
      'pkg/util.py',
      'poetry.lock',
      'tests/__init__.py',
      'tests/conftest.py',
      'tests/test_bar.py'
    ]
    const expected = computeDependencyHash({
      file: 'tests/test_bar.py',
      closure,
      fileHashes: new Map(closure.map(file => [file, sha(FILES[file])])),
      configHash: sha(CONFIG),
      salt: 'v2'
    })
    expect(result.depHashes.get('tests/test_bar.py')).toBe(expected)

    const written = JSON.parse(await readFile(join(root, 'hashes.json'), 'utf-8'))
    expect(Object.keys(written)).toEqual(['tests/test_bar.py', 'tests/test_foo.py'])
    expect(written['tests/test_bar.py']).toBe(expected)
  })

  it('should produce identical output on repeated runs', async () => {
    await run({ outDepHashes: join(root, 'a.json'), outRelations: join(root, 'ra.json') })
    await run({ outDepHashes: join(root, 'b.json'), outRelations: join(root, 'rb.json') })

    expect(await readFile(join(root, 'a.json'), 'utf-8')).toBe(await readFile(join(root, 'b.json'), 'utf-8'))
    expect(await readFile(join(root, 'ra.json'), 'utf-8')).toBe(await readFile(join(root, 'rb.json'), 'utf-8'))
  })

  it('should change every digest when the config bytes change', async () => {
    const before = await run({ outDepHashes: join(root, 'a.json') })
    await appendFile(join(root, 'depsum.yaml'), '# cache bust\n')
    const after = await run({ outDepHashes: join(root, 'b.json') })

    for (const file of before.inputFiles) {
      expect(after.depHashes.get(file)).not.toBe(before.depHashes.get(file))
    }
  })

  it('should change only the digests whose closure changed', async () => {
    const before = await run({ outDepHashes: join(root, 'a.json') })
    await writeFile(join(root, 'pkg/db.py'), 'db changed')
    const after = await run({ outDepHashes: join(root, 'b.json') })

    expect(after.depHashes.get('tests/test_foo.py')).not.toBe(before.depHashes.get('tests/test_foo.py'))
    expect(after.depHashes.get('tests/test_bar.py')).toBe(before.depHashes.get('tests/test_bar.py'))
  })

  it('should write relations with sorted keys', async () => {
    await run({ outRelations: join(root, 'relations.json') })

    const relations = JSON.parse(await readFile(join(root, 'relations.json'), 'utf-8'))
    expect(Object.keys(relations)).toEqual([
      'pkg/__init__.py',
      'pkg/db.py',
      'pkg/util.py',
      'poetry.lock',
      'tests/__init__.py',
      'tests/conftest.py',
      'tests/test_bar.py',
      'tests/test_foo.py'
    ])
    expect(relations['tests/test_bar.py']).toEqual([
      'pkg/__init__.py',
      'pkg/util.py',
      'poetry.lock',
      'tests/__init__.py',
      'tests/conftest.py'
    ])
  })

  it('should write the recursive dependencies of one input', async () => {
    const out = join(root, 'deps.json')
    await run({ outRecursiveDeps: out, outRecursiveDepsFor: 'tests/test_bar.py' })

    expect(JSON.parse(await readFile(out, 'utf-8'))).toEqual([
      'pkg/__init__.py',
      'pkg/util.py',
      'poetry.lock',
      'tests/__init__.py',
      'tests/conftest.py',
      'tests/test_bar.py'
    ])
  })

  it('should report forward and reverse dependency stats', async () => {
    const result = await run({ printDepStats: true, printRevDepStats: true })

    expect(result.depStatLines).toEqual(['7\ttests/test_foo.py', '6\ttests/test_bar.py'])
    expect(result.revDepStatLines).toEqual([
      '2\tpkg/__init__.py',
      '2\tpkg/util.py',
      '2\tpoetry.lock',
      '2\ttests/__init__.py',
      '2\ttests/conftest.py',
      '1\tpkg/db.py',
      '1\ttests/test_bar.py',
      '1\ttests/test_foo.py'
    ])
  })

  it('should sort stats by name on request', async () => {
    const result = await run({ printDepStats: true, statsSort: 'name' })
    expect(result.depStatLines).toEqual(['6\ttests/test_bar.py', '7\ttests/test_foo.py'])
  })

  it('should let input files replace the configured inputs', async () => {
    const result = await run({ inputFiles: ['tests/test_bar.py'], outDepHashes: join(root, 'h.json') })

    expect(result.inputFiles).toEqual(['tests/test_bar.py'])
    expect([...result.depHashes.keys()]).toEqual(['tests/test_bar.py'])
    expect(result.graph?.visited.has('pkg/db.py')).toBe(false)
  })

  it('should exit cleanly when no input matches', async () => {
    const result = await run({ inputFiles: ['nothing/**/*.py'] })

    expect(result.inputFiles).toEqual([])
    expect(result.graph).toBeUndefined()
    expect(stderr.mock.calls.some(call => String(call[0]).includes('No input files found. Exiting.'))).toBe(true)
  })

  it('should fail on a missing config file', async () => {
    const attempt = runDepsum({ config: join(root, 'missing.yaml'), showProgress: false })
    await expect(attempt).rejects.toThrow(/^failed to load config file: failed to read config file/)
    await expect(attempt).rejects.toMatchObject({ code: 'CONFIG' })
  })

  it('should fail the run on a relative import', async () => {
    await writeFile(join(root, 'tests/test_rel.py'), 'from .helpers import thing\n')

    const attempt = run({ outDepHashes: join(root, 'h.json') })
    await expect(attempt).rejects.toThrow(
      "error while visiting files: error while visiting file 'tests/test_rel.py'"
    )
    await expect(attempt).rejects.toMatchObject({ code: 'RESOLVE' })
  })
})
