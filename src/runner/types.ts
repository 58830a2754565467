// src/runner/types.ts
import type { StatsSort } from '../reporter/types.js'
import type { RelationGraph } from '../graph/types.js'

export interface RunOptions {
  /** Path to the YAML config */
  config: string
  verbose?: boolean
  /** Replaces the configured `inputs` patterns */
  inputFiles?: string[]
  printDepStats?: boolean
  printRevDepStats?: boolean
  statsSort?: StatsSort
  outDepHashes?: string
  outRelations?: string
  outRecursiveDeps?: string
  outRecursiveDepsFor?: string
  hashSalt?: string
  /** Worker pool size for hashing, defaults to the number of CPUs */
  concurrency?: number
  /** Show spinners while building the graph and hashing */
  showProgress?: boolean
}

export interface RunResult {
  baseDir: string
  inputFiles: string[]
  /** Absent when no input file matched */
  graph?: RelationGraph
  /** Input file → hex digest; empty unless dependency hashes were requested */
  depHashes: Map<string, string>
  /** `count<TAB>name` lines in report order */
  depStatLines: string[]
  revDepStatLines: string[]
}
