// src/runner/run.ts
import ora from 'ora'
import type { RunOptions, RunResult } from './types.js'
import type { LoadedConfig } from '../config/types.js'
import { loadConfig, resolveBaseDir } from '../config/loader.js'
import { FileVisitor } from '../relation-engine/visitor.js'
import { globFiles } from '../relation-engine/glob.js'
import { buildRelationGraph, sortUnique } from '../graph/builder.js'
import { computeFileHashes } from '../hasher/hash.js'
import { runHashPipeline, type HashPipelineResult } from '../hasher/pipeline.js'
import { formatStats, revDepStats } from '../reporter/stats.js'
import { sortedRecord, writeJsonFile } from '../reporter/json.js'
import { defaultConcurrency } from '../utils/concurrency.js'
import { UsageError, withContext } from '../utils/errors.js'
import { log, setVerbose, verbose, warn } from '../utils/logger.js'

export function validateRunOptions(options: RunOptions): void {
  if (!options.config) {
    throw new UsageError('config path not specified')
  }
  if (!options.outRecursiveDeps !== !options.outRecursiveDepsFor) {
    throw new UsageError('both --out-recursive-deps and --out-recursive-deps-for must be specified together')
  }
}

export async function collectInputFiles(patterns: string[], baseDir: string): Promise<string[]> {
  const files: string[] = []
  for (const pattern of patterns) {
    try {
      files.push(...await globFiles(pattern, baseDir))
    } catch (error) {
      throw withContext(`error while collecting input files: glob '${pattern}'`, error)
    }
  }
  return sortUnique(files)
}

/**
 * One full run: load config, build the relation graph, then closures, hashes
 * and reports as requested. Throws on the first error; nothing is written
 * past that point.
 */
export async function runDepsum(options: RunOptions): Promise<RunResult> {
  validateRunOptions(options)
  setVerbose(options.verbose ?? false)
  const statsSort = options.statsSort ?? 'count'
  const isSilent = !options.showProgress || (options.verbose ?? false)

  log(`Loading Config: ${options.config}`)
  let loaded: LoadedConfig
  try {
    loaded = await loadConfig(options.config)
  } catch (error) {
    throw withContext('failed to load config file', error)
  }
  const { config, configHash } = loaded

  const overrides = (options.inputFiles ?? []).filter(f => f !== '')
  if (overrides.length > 0) {
    config.inputs = overrides
  }

  verbose(`Config:\n${JSON.stringify(config, null, 2)}`)

  const baseDir = resolveBaseDir(options.config, config)
  log(`Base Directory: ${baseDir}`)

  const inputFiles = await collectInputFiles(config.inputs, baseDir)
  const result: RunResult = {
    baseDir,
    inputFiles,
    depHashes: new Map(),
    depStatLines: [],
    revDepStatLines: []
  }
  if (inputFiles.length === 0) {
    warn('No input files found. Exiting.')
    return result
  }

  log('Generating dependency graph')
  const graphSpinner = ora({ text: 'Generating dependency graph', isSilent }).start()
  const visitor = new FileVisitor(config, baseDir)
  try {
    result.graph = await buildRelationGraph(inputFiles, visitor, {
      globalDeps: config.global_deps,
      onWave: (wave, count) => {
        graphSpinner.text = `Generating dependency graph (wave ${wave}, ${count} files)`
      }
    })
  } catch (error) {
    graphSpinner.fail('Dependency graph failed')
    throw withContext('error while visiting files', error)
  }
  const { relations, visited } = result.graph
  graphSpinner.succeed(`Dependency graph: ${visited.size} files`)

  if (options.outRelations) {
    log(`Writing relations to: ${options.outRelations}`)
    await writeJsonFile(options.outRelations, sortedRecord(relations))
  }

  const wantsHashes = Boolean(options.outDepHashes)
  if (!options.printDepStats && !options.printRevDepStats && !wantsHashes && !options.outRecursiveDeps) {
    log('Done')
    return result
  }

  const concurrency = options.concurrency ?? defaultConcurrency()
  const recursiveDepsFor = options.outRecursiveDepsFor
  const recursiveDepsPath = options.outRecursiveDeps
  if (recursiveDepsFor && !inputFiles.includes(recursiveDepsFor)) {
    warn(`'${recursiveDepsFor}' is not an input file; no recursive dependencies written`)
  }

  const hashSpinner = ora({ text: 'Calculating dependency hashes', isSilent }).start()
  let pipeline: HashPipelineResult
  try {
    let fileHashes: Map<string, Buffer> | undefined
    if (wantsHashes) {
      log('Calculating file hashes')
      fileHashes = await computeFileHashes(visited, baseDir, concurrency)
    }

    log('Calculating dependency hashes')
    pipeline = await runHashPipeline({
      inputFiles,
      relations,
      configHash,
      fileHashes,
      salt: options.hashSalt,
      hashes: wantsHashes,
      depStats: options.printDepStats,
      revDepStats: options.printRevDepStats,
      concurrency,
      recursiveDeps: recursiveDepsFor && recursiveDepsPath
        ? {
            file: recursiveDepsFor,
            write: async closure => {
              log(`Writing recursive dependencies of ${recursiveDepsFor} to: ${recursiveDepsPath}`)
              await writeJsonFile(recursiveDepsPath, closure)
            }
          }
        : undefined
    })
  } catch (error) {
    hashSpinner.fail('Dependency hashing failed')
    throw error
  }
  hashSpinner.succeed(`Processed ${inputFiles.length} input files`)

  if (options.printDepStats) {
    result.depStatLines = formatStats(pipeline.depStats, statsSort)
    result.depStatLines.forEach(line => log(line))
  }

  if (options.outDepHashes) {
    log(`Writing dependency hashes to: ${options.outDepHashes}`)
    await writeJsonFile(options.outDepHashes, sortedRecord(pipeline.depHashes))
  }
  result.depHashes = pipeline.depHashes

  if (options.printRevDepStats) {
    result.revDepStatLines = formatStats(revDepStats(pipeline.revDepCounts), statsSort)
    result.revDepStatLines.forEach(line => log(line))
  }

  log('Done')
  return result
}
