// src/config/loader.ts
import { readFile } from 'fs/promises'
import { createHash } from 'crypto'
import { dirname, join } from 'path'
import { parse } from 'yaml'
import type { DepsumConfig, LoadedConfig, PathRule, RuleActions } from './types.js'
import { ConfigError, errorMessage } from '../utils/errors.js'

type YamlMapping = Record<string, unknown>

const TOP_LEVEL_KEYS = [
  'base_dir',
  'inputs',
  'global_deps',
  'global_exclude',
  'root_python_packages',
  'path_rules'
]

const ACTION_KEYS = [
  'visit',
  'visit_siblings',
  'visit_grand_siblings',
  'visit_imported_python_modules',
  'visit_python_all_submodules_for',
  'exclude'
]

const PATH_RULE_KEYS = [...ACTION_KEYS, 'regex_rules']

function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function checkKeys(value: YamlMapping, allowed: string[], where: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new ConfigError(`unknown field '${key}' in ${where}`)
    }
  }
}

/**
 * Accepts a single string or a list of strings; `null` (an empty YAML value)
 * counts as an empty list.
 */
export function toStringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return []
  if (typeof value === 'string') return [value]
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value]
  }
  throw new ConfigError(`${field}: expected string or list of strings`)
}

function toBoolean(value: unknown, field: string): boolean {
  if (value === undefined || value === null) return false
  if (typeof value === 'boolean') return value
  throw new ConfigError(`${field}: expected a boolean`)
}

function toMapping(value: unknown, field: string): YamlMapping {
  if (value === undefined || value === null) return {}
  if (isMapping(value)) return value
  throw new ConfigError(`${field}: expected a mapping`)
}

function parseActions(raw: YamlMapping, where: string): RuleActions {
  return {
    visit: toStringList(raw.visit, `${where}.visit`),
    visit_siblings: toStringList(raw.visit_siblings, `${where}.visit_siblings`),
    visit_grand_siblings: toStringList(raw.visit_grand_siblings, `${where}.visit_grand_siblings`),
    visit_imported_python_modules: toBoolean(
      raw.visit_imported_python_modules,
      `${where}.visit_imported_python_modules`
    ),
    visit_python_all_submodules_for: toStringList(
      raw.visit_python_all_submodules_for,
      `${where}.visit_python_all_submodules_for`
    ),
    exclude: toStringList(raw.exclude, `${where}.exclude`)
  }
}

function parsePathRule(pattern: string, value: unknown): PathRule {
  const where = `path_rules['${pattern}']`
  const raw = toMapping(value, where)
  checkKeys(raw, PATH_RULE_KEYS, where)

  const regexRules: Record<string, RuleActions> = {}
  for (const [regex, regexValue] of Object.entries(toMapping(raw.regex_rules, `${where}.regex_rules`))) {
    const regexWhere = `${where}.regex_rules['${regex}']`
    const regexRaw = toMapping(regexValue, regexWhere)
    checkKeys(regexRaw, ACTION_KEYS, regexWhere)
    regexRules[regex] = parseActions(regexRaw, regexWhere)
  }

  return { ...parseActions(raw, where), regex_rules: regexRules }
}

/**
 * Validate a decoded YAML document and normalize it into a DepsumConfig.
 */
export function parseConfig(document: unknown): DepsumConfig {
  if (document === undefined || document === null) {
    throw new ConfigError('config file is empty')
  }
  if (!isMapping(document)) {
    throw new ConfigError('config file must contain a mapping at the top level')
  }
  checkKeys(document, TOP_LEVEL_KEYS, 'config')

  const baseDir = document.base_dir ?? ''
  if (typeof baseDir !== 'string') {
    throw new ConfigError('base_dir: expected a string')
  }

  const pathRules: Record<string, PathRule> = {}
  for (const [pattern, value] of Object.entries(toMapping(document.path_rules, 'path_rules'))) {
    pathRules[pattern] = parsePathRule(pattern, value)
  }

  return {
    base_dir: baseDir,
    inputs: toStringList(document.inputs, 'inputs'),
    global_deps: toStringList(document.global_deps, 'global_deps'),
    global_exclude: toStringList(document.global_exclude, 'global_exclude'),
    root_python_packages: toStringList(document.root_python_packages, 'root_python_packages'),
    path_rules: pathRules
  }
}

export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  let bytes: Buffer
  try {
    bytes = await readFile(configPath)
  } catch (error) {
    throw new ConfigError(`failed to read config file '${configPath}': ${errorMessage(error)}`, { cause: error })
  }

  let document: unknown
  try {
    document = parse(bytes.toString('utf-8'))
  } catch (error) {
    throw new ConfigError(`failed to decode config file '${configPath}': ${errorMessage(error)}`, { cause: error })
  }

  return {
    config: parseConfig(document),
    configHash: createHash('sha256').update(bytes).digest(),
    configPath
  }
}

/**
 * base_dir is relative to the directory holding the config file.
 */
export function resolveBaseDir(configPath: string, config: DepsumConfig): string {
  return join(dirname(configPath), config.base_dir)
}
