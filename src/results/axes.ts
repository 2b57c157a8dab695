/**
 * Axis resolution: turns a parameter name from the caller into accessors
 * over ResultEntry.
 *
 * Lookup order is configuration key, derived metric, metric alias, raw stat
 * name. A name none of these can serve is rejected with the list of valid
 * names before any report output is produced.
 */

import {
  CAPACITY_KEYS,
  UNKNOWN_CATEGORY,
  isConfigKey,
  metricValue,
  type ConfigKey,
  type ResultEntry,
  type ResultSet,
} from '../types.js'
import {
  deriveMetric,
  getDerivedMetricDefinition,
  isDerivedMetricName,
  type DeriveOptions,
  type DerivedMetricName,
} from '../derived/engine.js'
import { isMetricAlias, resolveAlias } from '../derived/aliases.js'
import { UnknownParameterError, type AxisRole } from '../errors.js'
import { toGigahertz, toKibibytes } from '../units/normalize.js'
import { parameterNames, type CategoryValue, type ParameterKind } from './result-set.js'

export type AxisKind = 'capacity' | 'frequency' | 'numeric' | 'categorical'

export interface Axis {
  readonly name: string
  readonly source: ParameterKind
  readonly kind: AxisKind
  readonly label: string
  /** Plot coordinate; undefined when the run has no numeric value. */
  readonly numeric: (entry: ResultEntry) => number | undefined
  /** Grouping category for tables. */
  readonly category: (entry: ResultEntry) => CategoryValue
  /** True when the run's value is an estimate rather than a measurement. */
  readonly isEstimated: (entry: ResultEntry) => boolean
}

/**
 * Keys consulted, in order, when a config axis is requested. Runs whose
 * directory names carry a bare capacity ("32kB") or "assoc4" sweep the L1D
 * cache, so `l1d_size` and `l1d_assoc` fall back to those keys.
 */
const CONFIG_FALLBACKS: Readonly<Partial<Record<ConfigKey, readonly ConfigKey[]>>> = {
  l1d_size: ['l1d_size', 'cache_size'],
  l1d_assoc: ['l1d_assoc', 'associativity'],
}

const NUMERIC_CONFIG_KEYS: ReadonlySet<ConfigKey> = new Set([
  'associativity',
  'l1i_assoc',
  'l1d_assoc',
  'l2_assoc',
  'l3_assoc',
])

const CAPACITY_KEY_SET: ReadonlySet<string> = new Set(CAPACITY_KEYS)

/** Configuration value for `key`, following {@link CONFIG_FALLBACKS}. */
export function configValue(entry: ResultEntry, key: ConfigKey): string | number | boolean | undefined {
  for (const candidate of CONFIG_FALLBACKS[key] ?? [key]) {
    const value = entry.config[candidate]
    if (value !== undefined) return value
  }
  return undefined
}

/** "l1d_size" → "L1D Size" (a letter after a non-letter is capitalised). */
export function titleCase(name: string): string {
  return name
    .replace(/_/g, ' ')
    .replace(/(^|[^a-zA-Z])([a-z])/g, (_, before: string, letter: string) => before + letter.toUpperCase())
}

function configAxisKind(key: ConfigKey): AxisKind {
  if (CAPACITY_KEY_SET.has(key)) return 'capacity'
  if (key === 'clock_ghz') return 'frequency'
  if (NUMERIC_CONFIG_KEYS.has(key)) return 'numeric'
  return 'categorical'
}

function configAxisLabel(key: ConfigKey, kind: AxisKind): string {
  const base = titleCase(key === 'clock_ghz' ? 'clock' : key)
  if (kind === 'capacity') return `${base} (KB)`
  if (kind === 'frequency') return `${base} (GHz)`
  return base
}

const notEstimated = (): boolean => false

function configAxis(key: ConfigKey): Axis {
  const kind = configAxisKind(key)
  return {
    name: key,
    source: 'config',
    kind,
    label: configAxisLabel(key, kind),
    numeric: (entry) => {
      const value = configValue(entry, key)
      if (value === undefined || typeof value === 'boolean') return undefined
      if (kind === 'capacity') return toKibibytes(value)
      if (kind === 'frequency') return toGigahertz(value)
      return typeof value === 'number' ? value : undefined
    },
    category: (entry) => configValue(entry, key) ?? UNKNOWN_CATEGORY,
    isEstimated: notEstimated,
  }
}

function numericCategory(value: number | undefined): CategoryValue {
  return value ?? UNKNOWN_CATEGORY
}

function derivedAxis(name: DerivedMetricName, options: DeriveOptions): Axis {
  const definition = getDerivedMetricDefinition(name)
  return {
    name,
    source: 'derived',
    kind: 'numeric',
    label: definition.label,
    numeric: (entry) => deriveMetric(name, entry.metrics, options).value,
    category: (entry) => deriveMetric(name, entry.metrics, options).value,
    isEstimated: (entry) => deriveMetric(name, entry.metrics, options).basis === 'estimated',
  }
}

function aliasAxis(name: string): Axis {
  return {
    name,
    source: 'alias',
    kind: 'numeric',
    label: titleCase(name),
    numeric: (entry) => resolveAlias(name, entry.metrics),
    category: (entry) => numericCategory(resolveAlias(name, entry.metrics)),
    isEstimated: notEstimated,
  }
}

function rawMetricAxis(name: string, resultSet: ResultSet): Axis {
  const numericValues = resultSet.entries.some((entry) => typeof metricValue(entry.metrics, name) === 'number')
  return {
    name,
    source: 'metric',
    kind: numericValues ? 'numeric' : 'categorical',
    label: name,
    numeric: (entry) => {
      const value = metricValue(entry.metrics, name)
      return typeof value === 'number' && Number.isFinite(value) ? value : undefined
    },
    category: (entry) => metricValue(entry.metrics, name) ?? UNKNOWN_CATEGORY,
    isEstimated: notEstimated,
  }
}

function hasConfigValue(resultSet: ResultSet, key: ConfigKey): boolean {
  return resultSet.entries.some((entry) => configValue(entry, key) !== undefined)
}

/**
 * Every name {@link resolveAxis} accepts for this ResultSet: the observed
 * parameters plus config keys reachable only through a fallback.
 */
export function validAxisNames(resultSet: ResultSet): readonly string[] {
  const names = new Set(parameterNames(resultSet))
  for (const key of Object.keys(CONFIG_FALLBACKS)) {
    if (isConfigKey(key) && hasConfigValue(resultSet, key)) names.add(key)
  }
  return [...names].sort()
}

/**
 * Resolves `name` against the runs in `resultSet`.
 *
 * @throws {UnknownParameterError} when no run provides the parameter.
 */
export function resolveAxis(
  name: string,
  resultSet: ResultSet,
  role: AxisRole,
  options: DeriveOptions = {}
): Axis {
  if (resultSet.entries.length > 0) {
    if (isConfigKey(name) && hasConfigValue(resultSet, name)) return configAxis(name)
    if (isDerivedMetricName(name)) return derivedAxis(name, options)
    if (isMetricAlias(name) && resultSet.entries.some((entry) => resolveAlias(name, entry.metrics) !== undefined)) {
      return aliasAxis(name)
    }
    if (resultSet.entries.some((entry) => metricValue(entry.metrics, name) !== undefined)) {
      return rawMetricAxis(name, resultSet)
    }
  }
  throw new UnknownParameterError(name, role, validAxisNames(resultSet))
}
