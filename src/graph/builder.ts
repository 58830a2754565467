// src/graph/builder.ts
import type { RelationGraph } from './types.js'
import { withContext } from '../utils/errors.js'
import { verbose } from '../utils/logger.js'

/**
 * Anything that can list a file's direct relations. FileVisitor in
 * production, plain maps in tests.
 */
export interface RelationSource {
  visitFile(file: string): Promise<string[]>
}

export interface BuildGraphOptions {
  /** Related to every visited file */
  globalDeps?: string[]
  /** Called after each wave with the number of files visited so far */
  onWave?: (wave: number, visitedCount: number) => void
}

export function sortUnique(items: Iterable<string>): string[] {
  return [...new Set(items)].sort()
}

/**
 * Expand the inputs wave by wave until no new file turns up. Visits run one
 * at a time: the source's caches are not safe for interleaved use.
 */
export async function buildRelationGraph(
  inputFiles: string[],
  source: RelationSource,
  options: BuildGraphOptions = {}
): Promise<RelationGraph> {
  const globalDeps = options.globalDeps ?? []
  const relations = new Map<string, string[]>()
  const visited = new Set<string>()

  let frontier = sortUnique(inputFiles)
  let wave = 0

  while (frontier.length > 0) {
    verbose('---')
    const next: string[] = []

    for (const file of frontier) {
      if (visited.has(file)) continue
      visited.add(file)

      let direct: string[]
      try {
        direct = await source.visitFile(file)
      } catch (error) {
        throw withContext(`error while visiting file '${file}'`, error)
      }

      const fileRelations = sortUnique([...globalDeps, ...direct])
      relations.set(file, fileRelations)
      next.push(...fileRelations)
    }

    wave++
    options.onWave?.(wave, visited.size)
    frontier = sortUnique(next)
  }

  return { relations, visited }
}
