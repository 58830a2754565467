// src/python-resolver/imports.ts
import type { PythonImports } from './types.js'

const SIMPLE_IMPORT = /^ *import ([^ \n]+)/gm
const FROM_IMPORT = /^ *from ([^ \n]+) import (\([^)]+\)|[^\n]+)/gm
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/g

/**
 * Regex-based import scan; comments, strings and `as` aliases are not
 * understood, so the result may contain names that are not real modules.
 */
export function parsePythonImports(source: string): PythonImports {
  const modules: string[] = []
  const bindings = new Map<string, string>()

  for (const match of source.matchAll(SIMPLE_IMPORT)) {
    const module = match[1]
    modules.push(module)
    bindings.set(module, module)
  }

  for (const match of source.matchAll(FROM_IMPORT)) {
    const module = match[1]
    modules.push(module)
    for (const ident of match[2].matchAll(IDENTIFIER)) {
      const fullName = `${module}.${ident[0]}`
      modules.push(fullName)
      bindings.set(ident[0], fullName)
    }
  }

  return { modules, bindings }
}
