/**
 * Read-only traversals over a ResultSet: grouping, summary statistics,
 * category ordering and the list of parameters the runs provide.
 * Nothing here mutates an entry.
 */

import {
  CONFIG_KEYS,
  EMPTY_SUMMARY,
  UNKNOWN_CATEGORY,
  metricValue,
  type ResultEntry,
  type ResultSet,
  type Summary,
} from '../types.js'
import { DERIVED_METRICS } from '../derived/engine.js'
import { METRIC_ALIASES, resolveAlias } from '../derived/aliases.js'
import { isCapacityString, toKibibytes } from '../units/normalize.js'

// ---------------------------------------------------------------------------
// Grouping
// ---------------------------------------------------------------------------

/**
 * Partitions entries by `keyFn`. Keys appear in order of first occurrence and
 * each group keeps discovery order. Every entry lands in exactly one group.
 */
export function groupBy<K>(
  entries: readonly ResultEntry[],
  keyFn: (entry: ResultEntry) => K
): Map<K, ResultEntry[]> {
  const groups = new Map<K, ResultEntry[]>()
  for (const entry of entries) {
    const key = keyFn(entry)
    const group = groups.get(key)
    if (group === undefined) {
      groups.set(key, [entry])
    } else {
      group.push(entry)
    }
  }
  return groups
}

/** Groups by application name; runs without one share the "unknown" group. */
export function groupByApplication(entries: readonly ResultEntry[]): Map<string, ResultEntry[]> {
  return groupBy(entries, (entry) => entry.config.application ?? UNKNOWN_CATEGORY)
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

/**
 * Mean, min, max and count of `metricFn` over the group. Entries for which
 * `metricFn` yields undefined or a non-finite number are left out; a group
 * with no usable values yields {@link EMPTY_SUMMARY}.
 */
export function summarize(
  entries: readonly ResultEntry[],
  metricFn: (entry: ResultEntry) => number | undefined
): Summary {
  const values: number[] = []
  for (const entry of entries) {
    const value = metricFn(entry)
    if (value !== undefined && Number.isFinite(value)) values.push(value)
  }
  if (values.length === 0) return EMPTY_SUMMARY

  const total = values.reduce((sum, v) => sum + v, 0)
  return {
    count: values.length,
    mean: total / values.length,
    min: Math.min(...values),
    max: Math.max(...values),
  }
}

// ---------------------------------------------------------------------------
// Category ordering
// ---------------------------------------------------------------------------

export type CategoryValue = string | number | boolean

function categoryRank(value: CategoryValue): number {
  if (typeof value === 'number') return 0
  if (typeof value === 'boolean') return 2
  if (value === UNKNOWN_CATEGORY) return 4
  return isCapacityString(value) ? 1 : 3
}

/**
 * Orders axis categories by meaning rather than spelling: capacities by
 * their size in KiB ("2kB" < "16kB" < "128kB"), numbers numerically,
 * false before true, other strings lexicographically, "unknown" last.
 */
export function compareCategories(a: CategoryValue, b: CategoryValue): number {
  const rankA = categoryRank(a)
  const rankB = categoryRank(b)
  if (rankA !== rankB) return rankA - rankB

  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b)

  const textA = String(a)
  const textB = String(b)
  if (rankA === 1) {
    const bySize = toKibibytes(textA) - toKibibytes(textB)
    if (bySize !== 0) return bySize
  }
  return textA < textB ? -1 : textA > textB ? 1 : 0
}

/** Returns a sorted copy of `values` using {@link compareCategories}. */
export function sortCategories<T extends CategoryValue>(values: Iterable<T>): T[] {
  return [...values].sort(compareCategories)
}

// ---------------------------------------------------------------------------
// Available parameters
// ---------------------------------------------------------------------------

export type ParameterKind = 'config' | 'derived' | 'alias' | 'metric'

export interface ParameterInfo {
  readonly name: string
  readonly kind: ParameterKind
  /** Values from the first few runs, "N/A" where a run lacks the parameter. */
  readonly samples: readonly string[]
}

const SAMPLE_COUNT = 3

function formatSample(value: CategoryValue | undefined): string {
  if (value === undefined) return 'N/A'
  if (typeof value === 'number') return String(Number(value.toPrecision(6)))
  return String(value)
}

function samplesOf(
  entries: readonly ResultEntry[],
  valueOf: (entry: ResultEntry) => CategoryValue | undefined
): readonly string[] {
  return entries.slice(0, SAMPLE_COUNT).map((entry) => formatSample(valueOf(entry)))
}

/**
 * Every parameter observed across the runs: configuration keys any run
 * carries, all derived metrics, aliases any run can resolve and every raw
 * stat name. Computed on demand from the entries.
 */
export function availableParameters(resultSet: ResultSet): readonly ParameterInfo[] {
  const { entries } = resultSet
  if (entries.length === 0) return []

  const config: ParameterInfo[] = CONFIG_KEYS
    .filter((key) => entries.some((entry) => entry.config[key] !== undefined))
    .map((key): ParameterInfo => ({ name: key, kind: 'config', samples: samplesOf(entries, (entry) => entry.config[key]) }))

  const derived: ParameterInfo[] = DERIVED_METRICS.map((definition): ParameterInfo => ({
    name: definition.name,
    kind: 'derived',
    samples: samplesOf(entries, (entry) => definition.derive(entry.metrics, {}).value),
  }))

  const aliases: ParameterInfo[] = [...METRIC_ALIASES.keys()]
    .filter((alias) => entries.some((entry) => resolveAlias(alias, entry.metrics) !== undefined))
    .sort()
    .map((alias): ParameterInfo => ({ name: alias, kind: 'alias', samples: samplesOf(entries, (entry) => resolveAlias(alias, entry.metrics)) }))

  const rawKeys = entries.reduce<Set<string>>((keys, entry) => {
    for (const key of Object.keys(entry.metrics)) keys.add(key)
    return keys
  }, new Set())
  const metrics: ParameterInfo[] = [...rawKeys]
    .sort()
    .map((key): ParameterInfo => ({ name: key, kind: 'metric', samples: samplesOf(entries, (entry) => metricValue(entry.metrics, key)) }))

  const seen = new Set<string>()
  return [...config, ...derived, ...aliases, ...metrics].filter((info) => {
    if (seen.has(info.name)) return false
    seen.add(info.name)
    return true
  })
}

/** Names from {@link availableParameters}, in the same order. */
export function parameterNames(resultSet: ResultSet): readonly string[] {
  return availableParameters(resultSet).map((info) => info.name)
}
