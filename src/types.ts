// ---------------------------------------------------------------------------
// Metric records
// ---------------------------------------------------------------------------

/** A logged statistic value: the float parse of the token, or the raw token. */
export type MetricValue = number | string

/**
 * Statistics parsed from a single metric log, keyed by the exact stat name
 * (e.g. `system.cpu.dcache.overallMisses::total`). Immutable once parsed.
 */
export type MetricRecord = Readonly<Record<string, MetricValue>>

/**
 * The value logged under `key`. Only the record's own keys count, so names
 * such as `toString` or `constructor` are never mistaken for stats.
 */
export function metricValue(metrics: MetricRecord, key: string): MetricValue | undefined {
  return Object.hasOwn(metrics, key) ? metrics[key] : undefined
}

// ---------------------------------------------------------------------------
// Configuration records
// ---------------------------------------------------------------------------

/**
 * Closed set of configuration keys recoverable from run names.
 * Order is the display order used when listing parameters.
 */
export const CONFIG_KEYS = [
  'application',
  'optimized',
  'cpu_type',
  'clock_ghz',
  'mem_type',
  'branch_predictor',
  'cache_size',
  'associativity',
  'l1i_size',
  'l1i_assoc',
  'l1d_size',
  'l1d_assoc',
  'l2_size',
  'l2_assoc',
  'l3_size',
  'l3_assoc',
] as const

export type ConfigKey = (typeof CONFIG_KEYS)[number]

/** Value type carried by each configuration key. */
export interface ConfigValueMap {
  application: string
  optimized: boolean
  cpu_type: string
  clock_ghz: number
  mem_type: string
  branch_predictor: string
  cache_size: string
  associativity: number
  l1i_size: string
  l1i_assoc: number
  l1d_size: string
  l1d_assoc: number
  l2_size: string
  l2_assoc: number
  l3_size: string
  l3_assoc: number
}

/** Sweep parameters recovered for one run. A missing key means "not encoded". */
export type ConfigRecord = { readonly [K in ConfigKey]?: ConfigValueMap[K] }

/** Mutable builder form of {@link ConfigRecord}, used only while extracting. */
export type MutableConfigRecord = { -readonly [K in ConfigKey]?: ConfigValueMap[K] }

const CONFIG_KEY_SET: ReadonlySet<string> = new Set(CONFIG_KEYS)

/** Type guard for configuration key names. */
export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEY_SET.has(value)
}

/** Configuration keys whose values are cache capacities. */
export const CAPACITY_KEYS = ['cache_size', 'l1i_size', 'l1d_size', 'l2_size', 'l3_size'] as const

/** Cache levels recognised in names and in stat keys. */
export const CACHE_LEVELS = ['l1d', 'l1i', 'l2', 'l3'] as const
export type CacheLevel = (typeof CACHE_LEVELS)[number]

// ---------------------------------------------------------------------------
// Result entries
// ---------------------------------------------------------------------------

/** One discovered run: where it came from, what it logged, how it was configured. */
export interface ResultEntry {
  /** Path of the metric log, relative to the collection root. */
  readonly sourcePath: string
  readonly metrics: MetricRecord
  readonly config: ConfigRecord
}

/** Creates a frozen {@link ResultEntry}. */
export function createResultEntry(
  sourcePath: string,
  metrics: MetricRecord,
  config: ConfigRecord
): ResultEntry {
  return Object.freeze({
    sourcePath,
    metrics: Object.freeze({ ...metrics }),
    config: Object.freeze({ ...config }),
  })
}

/** A configuration key that two sources disagreed on. */
export interface ExtractionConflict {
  readonly key: ConfigKey
  readonly kept: ConfigValueMap[ConfigKey]
  readonly discarded: ConfigValueMap[ConfigKey]
  /** Rule id (and path segment, for path extraction) that supplied the kept value. */
  readonly keptBy: string
  readonly discardedBy: string
}

/** Counters describing what collection found and what it skipped. */
export interface CollectDiagnostics {
  readonly rootFound: boolean
  readonly logFilesFound: number
  /** Logs that could not be read (permissions, I/O errors) and were skipped. */
  readonly unreadableLogs: number
  readonly emptyLogs: number
  readonly malformedLines: number
  readonly conflicts: number
}

/** All runs collected for one analysis invocation. Read-only after collection. */
export interface ResultSet {
  /** The collection root as given by the caller. */
  readonly root: string
  readonly entries: readonly ResultEntry[]
  readonly diagnostics: CollectDiagnostics
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export interface Summary {
  readonly count: number
  readonly mean: number
  readonly min: number
  readonly max: number
}

/** Summary of a group with no numeric values. Rendered as "-" in tables. */
export const EMPTY_SUMMARY: Summary = Object.freeze({
  count: 0,
  mean: Number.NaN,
  min: Number.NaN,
  max: Number.NaN,
})

/** Category label used when an entry has no value for the grouping axis. */
export const UNKNOWN_CATEGORY = 'unknown'
