import type { SplitBy } from '../config.js'
import type { ResultEntry } from '../types.js'
import { groupBy, groupByApplication, sortCategories } from '../results/result-set.js'

/** One slice of the runs, drawn as a table section or a plot series. */
export interface EntryGroup {
  readonly title: string
  readonly entries: readonly ResultEntry[]
}

export const UNOPTIMIZED_TITLE = 'Unoptimized'
export const OPTIMIZED_TITLE = 'Optimized'
export const ALL_RUNS_TITLE = 'All runs'

/**
 * Splits runs for presentation. Applications come back sorted with the
 * unknown group last; the optimization split yields Unoptimized before
 * Optimized and counts runs without the flag as unoptimized. Empty groups
 * are omitted.
 */
export function splitEntries(entries: readonly ResultEntry[], splitBy: SplitBy): EntryGroup[] {
  if (entries.length === 0) return []

  switch (splitBy) {
    case 'application': {
      const groups = groupByApplication(entries)
      return sortCategories(groups.keys()).map((title) => ({ title, entries: groups.get(title) ?? [] }))
    }
    case 'optimized': {
      const groups = groupBy(entries, (entry) => entry.config.optimized === true)
      const result: EntryGroup[] = []
      const unoptimized = groups.get(false)
      const optimized = groups.get(true)
      if (unoptimized !== undefined) result.push({ title: UNOPTIMIZED_TITLE, entries: unoptimized })
      if (optimized !== undefined) result.push({ title: OPTIMIZED_TITLE, entries: optimized })
      return result
    }
    case 'none':
      return [{ title: ALL_RUNS_TITLE, entries }]
  }
}

