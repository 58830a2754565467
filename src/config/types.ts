// src/config/types.ts

/**
 * What to do with a file once a rule matched it. Every string may carry
 * `$0`, `$1`, ... placeholders, filled from the regex match that triggered
 * the actions (left as written for path rule level actions).
 */
export interface RuleActions {
  /** Globs relative to base_dir */
  visit: string[]
  /** Globs relative to the visited file's directory */
  visit_siblings: string[]
  /** Globs relative to the visited file's directory and each ancestor below base_dir */
  visit_grand_siblings: string[]
  visit_imported_python_modules: boolean
  /** Module names or locally imported identifiers; every .py file below them is visited */
  visit_python_all_submodules_for: string[]
  /** Files matching these globs skip this block; a path rule's regex rules still run */
  exclude: string[]
}

export interface PathRule extends RuleActions {
  regex_rules: Record<string, RuleActions>
}

export interface DepsumConfig {
  base_dir: string
  inputs: string[]
  global_deps: string[]
  global_exclude: string[]
  root_python_packages: string[]
  path_rules: Record<string, PathRule>
}

export interface LoadedConfig {
  config: DepsumConfig
  /** SHA-256 of the raw config file bytes */
  configHash: Buffer
  configPath: string
}
