// src/reporter/stats.ts
import type { DepStat, StatsSort } from './types.js'
import { STATS_SORT_VALUES } from './types.js'
import { UsageError } from '../utils/errors.js'

export function parseStatsSort(value: string): StatsSort {
  const match = STATS_SORT_VALUES.find(v => v === value)
  if (!match) {
    throw new UsageError(`invalid stats-sort value: ${value}`)
  }
  return match
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * `count`: most dependencies first, ties by name. `name`: ascending name.
 */
export function sortStats(stats: DepStat[], mode: StatsSort): DepStat[] {
  return [...stats].sort((a, b) => {
    if (mode === 'count' && a.count !== b.count) {
      return b.count - a.count
    }
    return compareNames(a.name, b.name)
  })
}

export function revDepStats(counts: ReadonlyMap<string, number>): DepStat[] {
  return [...counts.entries()].map(([name, count]) => ({ name, count }))
}

export function formatStatLine(stat: DepStat): string {
  return `${stat.count}\t${stat.name}`
}

export function formatStats(stats: DepStat[], mode: StatsSort): string[] {
  return sortStats(stats, mode).map(formatStatLine)
}
