/**
 * Derived metrics: values computed from logged counters by one fixed formula
 * each. Every derivation is a pure function of a single run's metrics and
 * falls back to 0 when its inputs are missing or its denominator is not
 * positive.
 */

import { CACHE_LEVELS, metricValue, type CacheLevel, type MetricRecord } from '../types.js'
import {
  BRANCH_MISPREDICTED_KEYS,
  BRANCH_PREDICTED_KEYS,
  CPI_KEYS,
  CYCLE_KEYS,
  INSTRUCTION_KEYS,
  IPC_KEYS,
  SECONDS_KEYS,
  TICK_KEYS,
  cacheCounterKeys,
} from './stat-keys.js'

export const DERIVED_METRIC_NAMES = [
  'ipc',
  'cpi',
  'l1d_miss_rate',
  'l1i_miss_rate',
  'l2_miss_rate',
  'l3_miss_rate',
  'branch_accuracy',
  'execution_time',
] as const

export type DerivedMetricName = (typeof DERIVED_METRIC_NAMES)[number]

/**
 * How a derived value was obtained:
 * - `computed`: from the formula's counters
 * - `direct`: a counter holding the metric itself was logged
 * - `estimated`: from a proxy (ticks in place of cycles or wall time)
 * - `fallback`: inputs missing; the value is 0
 */
export type DerivationBasis = 'computed' | 'direct' | 'estimated' | 'fallback'

export interface DerivedValue {
  readonly value: number
  readonly basis: DerivationBasis
}

export interface DeriveOptions {
  /**
   * Clock rate used to turn ticks into seconds when no wall-time counter was
   * logged. Default 2 GHz, i.e. 0.5 ns per tick.
   */
  readonly nominalClockGhz?: number
}

export interface DerivedMetricDefinition {
  readonly name: DerivedMetricName
  /** Axis label. */
  readonly label: string
  readonly derive: (metrics: MetricRecord, options: DeriveOptions) => DerivedValue
}

const DEFAULT_NOMINAL_CLOCK_GHZ = 2

const FALLBACK: DerivedValue = Object.freeze({ value: 0, basis: 'fallback' })

/** First of `keys` holding a finite number, or undefined. */
export function numericMetric(metrics: MetricRecord, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = metricValue(metrics, key)
    if (typeof value === 'number' && Number.isFinite(value)) return value
  }
  return undefined
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0
}

function deriveIpc(metrics: MetricRecord): DerivedValue {
  const instructions = numericMetric(metrics, INSTRUCTION_KEYS)
  const cycles = numericMetric(metrics, CYCLE_KEYS)
  if (instructions !== undefined && cycles !== undefined) {
    return { value: ratio(instructions, cycles), basis: 'computed' }
  }
  const direct = numericMetric(metrics, IPC_KEYS)
  if (direct !== undefined) return { value: direct, basis: 'direct' }
  const ticks = numericMetric(metrics, TICK_KEYS)
  if (instructions !== undefined && ticks !== undefined) {
    return { value: ratio(instructions, ticks), basis: 'estimated' }
  }
  return FALLBACK
}

function deriveCpi(metrics: MetricRecord): DerivedValue {
  const instructions = numericMetric(metrics, INSTRUCTION_KEYS)
  const cycles = numericMetric(metrics, CYCLE_KEYS)
  if (instructions !== undefined && cycles !== undefined) {
    return { value: ratio(cycles, instructions), basis: 'computed' }
  }
  const direct = numericMetric(metrics, CPI_KEYS)
  return direct !== undefined ? { value: direct, basis: 'direct' } : FALLBACK
}

/**
 * misses / (hits + misses). The recomputed ratio replaces a logged miss rate,
 * which may be stale; the logged rate is used only without counters.
 */
function deriveMissRate(metrics: MetricRecord, level: CacheLevel): DerivedValue {
  const hits = numericMetric(metrics, cacheCounterKeys(level, 'hits'))
  const misses = numericMetric(metrics, cacheCounterKeys(level, 'misses'))
  if (hits !== undefined && misses !== undefined) {
    return { value: ratio(misses, hits + misses), basis: 'computed' }
  }
  const accesses = numericMetric(metrics, cacheCounterKeys(level, 'accesses'))
  if (misses !== undefined && accesses !== undefined) {
    return { value: ratio(misses, accesses), basis: 'computed' }
  }
  const logged = numericMetric(metrics, cacheCounterKeys(level, 'missRate'))
  return logged !== undefined ? { value: logged, basis: 'direct' } : FALLBACK
}

function deriveBranchAccuracy(metrics: MetricRecord): DerivedValue {
  const predicted = numericMetric(metrics, BRANCH_PREDICTED_KEYS)
  const mispredicted = numericMetric(metrics, BRANCH_MISPREDICTED_KEYS)
  if (predicted === undefined || mispredicted === undefined) return FALLBACK
  return { value: ratio(predicted, predicted + mispredicted), basis: 'computed' }
}

/**
 * Logged wall-equivalent seconds when present; otherwise ticks scaled by the
 * nominal clock period. The scaled figure is an estimate, exact only for runs
 * clocked at the nominal rate.
 */
function deriveExecutionTime(metrics: MetricRecord, options: DeriveOptions): DerivedValue {
  const seconds = numericMetric(metrics, SECONDS_KEYS)
  if (seconds !== undefined) return { value: seconds, basis: 'direct' }
  const ticks = numericMetric(metrics, TICK_KEYS)
  if (ticks === undefined) return FALLBACK
  const clockGhz = options.nominalClockGhz ?? DEFAULT_NOMINAL_CLOCK_GHZ
  return { value: ticks / (clockGhz * 1e9), basis: 'estimated' }
}

const MISS_RATE_LABELS: Readonly<Record<CacheLevel, string>> = {
  l1d: 'L1D Cache Miss Rate',
  l1i: 'L1I Cache Miss Rate',
  l2: 'L2 Cache Miss Rate',
  l3: 'L3 Cache Miss Rate',
}

export const DERIVED_METRICS: readonly DerivedMetricDefinition[] = [
  { name: 'ipc', label: 'Instructions Per Cycle (IPC)', derive: deriveIpc },
  { name: 'cpi', label: 'Cycles Per Instruction (CPI)', derive: deriveCpi },
  ...CACHE_LEVELS.map((level): DerivedMetricDefinition => ({
    name: `${level}_miss_rate`,
    label: MISS_RATE_LABELS[level],
    derive: (metrics) => deriveMissRate(metrics, level),
  })),
  { name: 'branch_accuracy', label: 'Branch Prediction Accuracy', derive: deriveBranchAccuracy },
  { name: 'execution_time', label: 'Execution Time (seconds)', derive: deriveExecutionTime },
]

const DEFINITIONS_BY_NAME: ReadonlyMap<string, DerivedMetricDefinition> = new Map(
  DERIVED_METRICS.map((definition) => [definition.name, definition])
)

export function isDerivedMetricName(name: string): name is DerivedMetricName {
  return DEFINITIONS_BY_NAME.has(name)
}

export function getDerivedMetricDefinition(name: DerivedMetricName): DerivedMetricDefinition {
  const definition = DEFINITIONS_BY_NAME.get(name)
  if (definition === undefined) {
    throw new Error(`[sweepstat] derived: no definition registered for ${name}`)
  }
  return definition
}

/** Computes one derived metric with its basis. Never throws for missing data. */
export function deriveMetric(
  name: DerivedMetricName,
  metrics: MetricRecord,
  options: DeriveOptions = {}
): DerivedValue {
  return getDerivedMetricDefinition(name).derive(metrics, options)
}

/** Computes every derived metric. */
export function deriveAll(
  metrics: MetricRecord,
  options: DeriveOptions = {}
): Readonly<Record<DerivedMetricName, number>> {
  const result: Partial<Record<DerivedMetricName, number>> = {}
  for (const definition of DERIVED_METRICS) {
    result[definition.name] = definition.derive(metrics, options).value
  }
  return {
    ipc: result.ipc ?? 0,
    cpi: result.cpi ?? 0,
    l1d_miss_rate: result.l1d_miss_rate ?? 0,
    l1i_miss_rate: result.l1i_miss_rate ?? 0,
    l2_miss_rate: result.l2_miss_rate ?? 0,
    l3_miss_rate: result.l3_miss_rate ?? 0,
    branch_accuracy: result.branch_accuracy ?? 0,
    execution_time: result.execution_time ?? 0,
  }
}
