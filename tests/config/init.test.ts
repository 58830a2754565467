// tests/config/init.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readFileSync } from 'fs'
import { join } from 'path'
import { parse } from 'yaml'
import { generateConfig, initConfig } from '../../src/config/init.js'
import { parseConfig } from '../../src/config/loader.js'
import { makeTree, removeTree } from '../helpers/tree.js'

describe('generateConfig', () => {
  it('should produce a config the loader accepts', () => {
    const config = parseConfig(parse(generateConfig({ rootPackages: ['shop'], inputs: 'tests/**/*_test.py' })))

    expect(config.inputs).toEqual(['tests/**/*_test.py'])
    expect(config.root_python_packages).toEqual(['shop'])
    expect(config.path_rules['tests/**/*_test.py'].visit_grand_siblings).toEqual(['conftest.py', '__init__.py'])
    expect(config.path_rules['**/*.py'].regex_rules['^ *import_all_submodules\\(([A-Za-z_][A-Za-z0-9_.]*)\\)'])
      .toMatchObject({ visit_python_all_submodules_for: ['$1'] })
  })

  it('should document that regexes anchor at line boundaries', () => {
    expect(generateConfig().split('\n')).toContain('    # multiline: ^ and $ match at the start and end of each line.')
  })

  it('should fall back to default packages', () => {
    const config = parseConfig(parse(generateConfig()))
    expect(config.root_python_packages).toEqual(['app', 'tests'])
  })
})

describe('initConfig', () => {
  let root: string

  beforeEach(async () => {
    root = await makeTree({})
  })

  afterEach(async () => {
    await removeTree(root)
  })

  it('should write depsum.yaml', () => {
    const path = initConfig(root)
    expect(path).toBe(join(root, 'depsum.yaml'))
    expect(readFileSync(path, 'utf-8')).toContain('path_rules:')
  })

  it('should refuse to overwrite without force', () => {
    initConfig(root)
    expect(() => initConfig(root)).toThrow(`Config already exists: ${join(root, 'depsum.yaml')}`)
    expect(() => initConfig(root, { force: true })).not.toThrow()
  })
})
