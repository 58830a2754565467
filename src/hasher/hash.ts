// src/hasher/hash.ts
import { createHash } from 'crypto'
import { readFile } from 'fs/promises'
import { join } from 'path'
import { runWithConcurrency } from '../utils/concurrency.js'
import { FileSystemError, errorMessage } from '../utils/errors.js'

/**
 * Bumped whenever the same inputs may produce a different digest, which
 * invalidates every previously stored hash at once.
 */
export const ALGORITHM_VERSION = 1n

export type FileHashes = ReadonlyMap<string, Buffer>

export interface DependencyHashInput {
  file: string
  /** Sorted closure of `file` */
  closure: readonly string[]
  fileHashes: FileHashes
  configHash: Buffer
  salt?: string
  algorithmVersion?: bigint
}

export function hashBytes(data: Buffer): Buffer {
  return createHash('sha256').update(data).digest()
}

/**
 * SHA-256 of every file's raw bytes, keyed by its base_dir-relative path.
 * Finished before any digest is computed, so the table is read-only while
 * digests run.
 */
export async function computeFileHashes(
  files: Iterable<string>,
  baseDir: string,
  concurrency: number
): Promise<Map<string, Buffer>> {
  const names = [...files].sort()
  const digests = await runWithConcurrency(
    names.map(name => async () => {
      const fullPath = join(baseDir, name)
      try {
        return hashBytes(await readFile(fullPath))
      } catch (error) {
        throw new FileSystemError(`error while reading file '${fullPath}': ${errorMessage(error)}`, { cause: error })
      }
    }),
    concurrency
  )
  return new Map(names.map((name, i) => [name, digests[i]]))
}

const EMPTY_DIGEST = Buffer.alloc(32)

export function computeDependencyHash(input: DependencyHashInput): string {
  const version = Buffer.alloc(8)
  version.writeBigUInt64LE(input.algorithmVersion ?? ALGORITHM_VERSION)

  const hasher = createHash('sha256')
  hasher.update(version)
  hasher.update(input.salt ?? '')
  hasher.update(input.configHash)
  hasher.update(input.file)

  for (const dep of input.closure) {
    hasher.update(dep)
    hasher.update(input.fileHashes.get(dep) ?? EMPTY_DIGEST)
  }

  return hasher.digest('hex')
}
