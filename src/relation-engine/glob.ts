// src/relation-engine/glob.ts
import { posix } from 'path'
import { globby } from 'globby'
import { FileSystemError, PatternError, errorMessage } from '../utils/errors.js'

/**
 * Reject patterns whose brackets or braces do not balance. The glob engine
 * would otherwise treat them as literals and silently match nothing. Inside a
 * `[...]` class every character but `]` is literal.
 */
export function assertValidGlob(pattern: string): void {
  let braces = 0
  let inClass = false
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i]
    if (ch === '\\') {
      i++
      continue
    }
    if (inClass) {
      if (ch === ']') inClass = false
      continue
    }
    if (ch === '[') {
      inClass = true
    } else if (ch === '{') {
      braces++
    } else if (ch === ']' || ch === '}') {
      if (ch === ']' || braces === 0) {
        throw new PatternError(`malformed glob '${pattern}': unexpected '${ch}'`)
      }
      braces--
    }
  }
  if (inClass) {
    throw new PatternError(`malformed glob '${pattern}': missing ']'`)
  }
  if (braces > 0) {
    throw new PatternError(`malformed glob '${pattern}': missing '}'`)
  }
}

function escapesCwd(path: string): boolean {
  return posix.isAbsolute(path) || path.split('/').includes('..')
}

/**
 * Files (never directories) under `cwd` matching `pattern`, as sorted
 * POSIX paths relative to `cwd`. A `cwd` that does not exist has no files.
 * Absolute patterns and `..` segments are rejected: nothing above `cwd` is
 * ever returned.
 */
export async function globFiles(pattern: string, cwd: string): Promise<string[]> {
  assertValidGlob(pattern)
  if (escapesCwd(pattern)) {
    throw new PatternError(`glob '${pattern}' reaches outside its directory`)
  }
  let matches: string[]
  try {
    matches = await globby(pattern, {
      cwd,
      dot: true,
      onlyFiles: true,
      expandDirectories: false,
      gitignore: false,
      suppressErrors: false
    })
  } catch (error) {
    throw new FileSystemError(`glob '${pattern}' in '${cwd}': ${errorMessage(error)}`, { cause: error })
  }
  const outside = matches.find(escapesCwd)
  if (outside !== undefined) {
    throw new PatternError(`glob '${pattern}' matched '${outside}' outside its directory`)
  }
  return matches.sort()
}

/**
 * Answers "does this base_dir-relative file match this pattern" by
 * enumerating each pattern once and remembering the result. The tree is
 * assumed not to change while a run is in progress.
 */
export class GlobMatcher {
  private baseDir: string
  private cache = new Map<string, Set<string>>()

  constructor(baseDir: string) {
    this.baseDir = baseDir
  }

  async matches(pattern: string, file: string): Promise<boolean> {
    let files = this.cache.get(pattern)
    if (!files) {
      files = new Set(await globFiles(pattern, this.baseDir))
      this.cache.set(pattern, files)
    }
    return files.has(file)
  }

  async matchesAny(patterns: string[], file: string): Promise<boolean> {
    for (const pattern of patterns) {
      if (await this.matches(pattern, file)) return true
    }
    return false
  }
}
