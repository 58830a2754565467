// src/reporter/types.ts

export type StatsSort = 'count' | 'name'

export const STATS_SORT_VALUES: readonly StatsSort[] = ['count', 'name']

export interface DepStat {
  name: string
  count: number
}
