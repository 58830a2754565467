// src/config/init.ts
import { writeFileSync, mkdirSync, existsSync } from 'fs'
import { join } from 'path'
import { ConfigError } from '../utils/errors.js'

export const CONFIG_FILE_NAME = 'depsum.yaml'

export interface InitOptions {
  /** Dotted packages whose imports get resolved */
  rootPackages?: string[]
  /** Glob selecting the test files */
  inputs?: string
  force?: boolean
}

export function generateConfig(options: InitOptions = {}): string {
  const rootPackages = options.rootPackages?.length ? options.rootPackages : ['app', 'tests']
  const inputs = options.inputs || 'tests/**/test_*.py'
  const packageLines = rootPackages.map(p => `  - "${p}"`).join('\n')

  return `# depsum configuration

# Where the repo is, relative to this file.
base_dir: "."

# Files that get a dependency hash.
inputs: "${inputs}"

# Files every input depends on (lock files, test runner options).
global_deps:
  - "pyproject.toml"

# Files that never produce relations. Temporary files belong here.
global_exclude:
  - "**/*.pyc"
  - "**/*.swp"

# Only imports of these packages (and their submodules) are resolved.
# Relative imports are not supported.
root_python_packages:
${packageLines}

# Glob pattern -> actions for every file it matches.
path_rules:
  # Each test file picks up conftest.py and __init__.py from its directory
  # and every parent directory below base_dir.
  "${inputs}":
    visit_grand_siblings:
      - "conftest.py"
      - "__init__.py"

  "**/*.py":
    # Regex based import scan; dynamic imports need regex_rules.
    visit_imported_python_modules: true
    visit_grand_siblings:
      - "__init__.py"
    # Regex -> actions, applied once per match. Capture groups are
    # available as $1, $2, ... ($0 is the whole match). Every regex is
    # multiline: ^ and $ match at the start and end of each line.
    regex_rules:
      "^ *import_all_submodules\\\\(([A-Za-z_][A-Za-z0-9_.]*)\\\\)":
        visit_python_all_submodules_for: "$1"
`
}

/**
 * Write a starter config into `dir`. Refuses to overwrite unless `force`.
 */
export function initConfig(dir: string, options: InitOptions = {}): string {
  const configPath = join(dir, CONFIG_FILE_NAME)

  if (existsSync(configPath) && !options.force) {
    throw new ConfigError(`Config already exists: ${configPath}`)
  }

  mkdirSync(dir, { recursive: true })
  writeFileSync(configPath, generateConfig(options), 'utf-8')

  return configPath
}
