// src/hasher/pipeline.ts
import { buildClosure } from './closure.js'
import { computeDependencyHash, type FileHashes } from './hash.js'
import type { DepStat } from '../reporter/types.js'
import { runWithConcurrency, defaultConcurrency } from '../utils/concurrency.js'
import { withContext } from '../utils/errors.js'

export interface HashPipelineOptions {
  inputFiles: string[]
  relations: ReadonlyMap<string, readonly string[]>
  configHash: Buffer
  /** Required when `hashes` is set */
  fileHashes?: FileHashes
  salt?: string
  hashes?: boolean
  depStats?: boolean
  revDepStats?: boolean
  /** Called with the closure of the input it names */
  recursiveDeps?: {
    file: string
    write: (closure: string[]) => Promise<void>
  }
  concurrency?: number
}

export interface HashPipelineResult {
  /** Input file → hex digest, keys sorted */
  depHashes: Map<string, string>
  /** One entry per input, unsorted */
  depStats: DepStat[]
  /** File → number of input closures containing it */
  revDepCounts: Map<string, number>
}

/**
 * Closure and digest per input file, fanned out over a worker pool. Tasks only
 * read the relation map and the file hash table, both complete before the
 * pipeline starts. The pool is joined before anything is returned; one
 * failed input fails the whole pipeline.
 */
export async function runHashPipeline(options: HashPipelineOptions): Promise<HashPipelineResult> {
  const {
    inputFiles,
    relations,
    configHash,
    fileHashes = new Map<string, Buffer>(),
    salt,
    recursiveDeps
  } = options

  const depHashes = new Map<string, string>()
  const depStats: DepStat[] = []
  const revDepCounts = new Map<string, number>()

  const tasks = inputFiles.map(file => async () => {
    const closure = buildClosure(relations, file)

    if (recursiveDeps && recursiveDeps.file === file) {
      try {
        await recursiveDeps.write(closure)
      } catch (error) {
        throw withContext(`error writing recursive dependencies of '${file}'`, error)
      }
    }

    if (options.depStats) {
      depStats.push({ name: file, count: closure.length })
    }

    if (options.revDepStats) {
      for (const dep of closure) {
        revDepCounts.set(dep, (revDepCounts.get(dep) ?? 0) + 1)
      }
    }

    if (options.hashes) {
      depHashes.set(file, computeDependencyHash({ file, closure, fileHashes, configHash, salt }))
    }
  })

  await runWithConcurrency(tasks, options.concurrency ?? defaultConcurrency())

  const sortedHashes = new Map([...depHashes.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
  return { depHashes: sortedHashes, depStats, revDepCounts }
}
