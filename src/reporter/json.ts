// src/reporter/json.ts
import { writeFile } from 'fs/promises'
import { FileSystemError, errorMessage } from '../utils/errors.js'

/**
 * Plain object with keys in ascending order, so the JSON is byte-identical
 * between runs whatever order the map was filled in.
 */
export function sortedRecord<V>(map: ReadonlyMap<string, V>): Record<string, V> {
  const out: Record<string, V> = {}
  for (const key of [...map.keys()].sort()) {
    const value = map.get(key)
    if (value !== undefined) out[key] = value
  }
  return out
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n'
}

export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  try {
    await writeFile(path, toJson(value), 'utf-8')
  } catch (error) {
    throw new FileSystemError(`error writing '${path}': ${errorMessage(error)}`, { cause: error })
  }
}
