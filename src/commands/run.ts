// src/commands/run.ts
import { Command } from 'commander'
import { runDepsum } from '../runner/run.js'
import type { RunOptions } from '../runner/types.js'
import { parseStatsSort } from '../reporter/stats.js'
import { withCpuProfile, PROFILE_FILE } from '../utils/profiler.js'
import { errorMessage } from '../utils/errors.js'
import { error as logError, log } from '../utils/logger.js'

export interface RunCommandOptions {
  config: string
  verbose?: boolean
  inputFiles?: string
  printDepStats?: boolean
  printRevDepStats?: boolean
  statsSort: string
  selfProfile?: boolean
  outDepHashes?: string
  outRelations?: string
  outRecursiveDeps?: string
  outRecursiveDepsFor?: string
  hashSalt?: string
}

export function toRunOptions(options: RunCommandOptions): RunOptions {
  return {
    config: options.config,
    verbose: options.verbose ?? false,
    inputFiles: options.inputFiles ? options.inputFiles.split(',') : [],
    printDepStats: options.printDepStats ?? false,
    printRevDepStats: options.printRevDepStats ?? false,
    statsSort: parseStatsSort(options.statsSort),
    outDepHashes: options.outDepHashes,
    outRelations: options.outRelations,
    outRecursiveDeps: options.outRecursiveDeps,
    outRecursiveDepsFor: options.outRecursiveDepsFor,
    hashSalt: options.hashSalt ?? '',
    showProgress: true
  }
}

export const runCommand = new Command('run')
  .description('Build the dependency graph and compute dependency hashes for the input files')
  .requiredOption('-c, --config <path>', 'Path to config file')
  .option('--verbose', 'Verbose output')
  .option('--input-files <files>', 'Comma separated list of input files (overrides config)')
  .option('--print-dep-stats', 'Print forward dependency statistics')
  .option('--print-rev-dep-stats', 'Print reverse dependency statistics')
  .option('--stats-sort <mode>', "Sort statistics by 'count' or 'name'", 'count')
  .option('--self-profile', `Profile the run into '${PROFILE_FILE}'`)
  .option('--out-dep-hashes <path>', 'Output dependency hashes to the specified file')
  .option('--out-relations <path>', 'Output relations to the specified file')
  .option('--out-recursive-deps <path>', "Output recursive dependencies of the file given in '--out-recursive-deps-for'")
  .option('--out-recursive-deps-for <file>', "Input file whose recursive dependencies go to '--out-recursive-deps'")
  .option('--hash-salt <salt>', 'Include this string in the dependency hash calculation. Use for cache busting.')
  .action(async (options: RunCommandOptions) => {
    try {
      const runOptions = toRunOptions(options)
      if (options.selfProfile) {
        await withCpuProfile(PROFILE_FILE, () => runDepsum(runOptions))
        log(`CPU profile written to: ${PROFILE_FILE}`)
      } else {
        await runDepsum(runOptions)
      }
    } catch (error) {
      logError(`Error: ${errorMessage(error)}`)
      process.exit(1)
    }
  })
