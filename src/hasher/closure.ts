// src/hasher/closure.ts

/**
 * Every file reachable from `file` through `relations`, `file` included,
 * sorted. Only membership matters to the digest, so no topological order is
 * kept.
 */
export function buildClosure(relations: ReadonlyMap<string, readonly string[]>, file: string): string[] {
  const visited = new Set<string>()
  const stack = [file]

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined || visited.has(current)) continue
    visited.add(current)
    for (const related of relations.get(current) ?? []) {
      if (!visited.has(related)) stack.push(related)
    }
  }

  return [...visited].sort()
}
