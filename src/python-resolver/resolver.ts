// src/python-resolver/resolver.ts
import { stat } from 'fs/promises'
import { join } from 'path'
import { MODULE_CANDIDATES, type ModuleCandidate } from './types.js'
import { FileSystemError, ResolveError } from '../utils/errors.js'

export function isUnderRootPackage(module: string, rootPackages: string[]): boolean {
  return rootPackages.some(root => module === root || module.startsWith(root + '.'))
}

/**
 * Maps dotted module names to the files that implement them and their
 * parent packages. Results are memoized for the resolver's lifetime, so one
 * resolver serves exactly one run. The cache is a plain map: calls must not
 * interleave (the graph builder awaits each file in turn).
 */
export class PythonModuleResolver {
  private baseDir: string
  private rootPackages: string[]
  private cache = new Map<string, string[]>()

  constructor(baseDir: string, rootPackages: string[]) {
    this.baseDir = baseDir
    this.rootPackages = rootPackages
  }

  get cacheSize(): number {
    return this.cache.size
  }

  async resolve(module: string): Promise<string[]> {
    const cached = this.cache.get(module)
    if (cached) return cached

    if (module.startsWith('.')) {
      throw new ResolveError(`relative imports are not supported: '${module}'`)
    }

    if (!isUnderRootPackage(module, this.rootPackages)) {
      this.cache.set(module, [])
      return []
    }

    const modulePath = module.replaceAll('.', '/')
    const paths: string[] = []
    let found = false

    for (const candidate of MODULE_CANDIDATES) {
      const kind = await this.probe(modulePath + candidate, candidate)
      if (kind === 'missing') continue
      found = true
      if (kind === 'file') paths.push(modulePath + candidate)
    }

    // Only modules that exist in some form pull in their parent package
    if (found) {
      const idx = module.lastIndexOf('.')
      if (idx !== -1) {
        paths.push(...await this.resolve(module.slice(0, idx)))
      }
    }

    this.cache.set(module, paths)
    return paths
  }

  private async probe(relativePath: string, candidate: ModuleCandidate): Promise<'file' | 'directory' | 'missing'> {
    const fullPath = join(this.baseDir, relativePath)
    try {
      const info = await stat(fullPath)
      if (candidate === '/') return info.isDirectory() ? 'directory' : 'missing'
      return 'file'
    } catch (error) {
      if (isMissing(error)) return 'missing'
      throw new FileSystemError(`failed to stat '${fullPath}'`, { cause: error })
    }
  }
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false
  return error.code === 'ENOENT' || error.code === 'ENOTDIR'
}
