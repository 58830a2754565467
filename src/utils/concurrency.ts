// src/utils/concurrency.ts
import { availableParallelism } from 'os'

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism())
}

/**
 * Run async tasks with at most `limit` in flight. Returns results in input
 * order. Every task is allowed to settle; if any failed, the first failure
 * (by input order) is thrown once all workers have stopped.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results: T[] = new Array(tasks.length)
  const failures: Array<{ index: number; error: unknown }> = []
  let nextIndex = 0

  async function runNext(): Promise<void> {
    while (nextIndex < tasks.length) {
      const index = nextIndex++
      try {
        results[index] = await tasks[index]()
      } catch (error) {
        failures.push({ index, error })
      }
    }
  }

  const workers = Array.from(
    { length: Math.min(Math.max(1, limit), tasks.length) },
    () => runNext()
  )

  await Promise.all(workers)

  if (failures.length > 0) {
    failures.sort((a, b) => a.index - b.index)
    throw failures[0].error
  }
  return results
}
