// src/python-resolver/types.ts

export interface PythonImports {
  /** Every dotted name seen, including `module.ident` for from-imports */
  modules: string[]
  /** Locally bound name → the dotted module it denotes */
  bindings: Map<string, string>
}

/**
 * Suffixes probed for a module path `p`, in order. `/` marks the namespace
 * package directory, which contributes no file of its own.
 */
export const MODULE_CANDIDATES = ['/__init__.py', '/', '.py', '.pyx', '.pyi', '.c'] as const

export type ModuleCandidate = typeof MODULE_CANDIDATES[number]
