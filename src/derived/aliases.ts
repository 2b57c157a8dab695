/**
 * Friendly names for frequently plotted raw counters, so a caller can ask
 * for `l1d_misses` instead of `system.cpu.dcache.overallMisses::total`.
 */

import { CACHE_LEVELS, type MetricRecord } from '../types.js'
import {
  BRANCH_MISPREDICTED_KEYS,
  BRANCH_PREDICTED_KEYS,
  CYCLE_KEYS,
  HOST_SECONDS_KEYS,
  INSTRUCTION_KEYS,
  MEM_BANDWIDTH_KEYS,
  MEM_READ_KEYS,
  MEM_WRITE_KEYS,
  SECONDS_KEYS,
  TICK_KEYS,
  cacheCounterKeys,
} from './stat-keys.js'
import { numericMetric } from './engine.js'

export const METRIC_ALIASES: ReadonlyMap<string, readonly string[]> = new Map<string, readonly string[]>([
  ['sim_seconds', SECONDS_KEYS],
  ['sim_ticks', TICK_KEYS],
  ['sim_insts', INSTRUCTION_KEYS],
  ['host_seconds', HOST_SECONDS_KEYS],
  ['num_cycles', CYCLE_KEYS],
  ...CACHE_LEVELS.flatMap((level): [string, readonly string[]][] => [
    [`${level}_hits`, cacheCounterKeys(level, 'hits')],
    [`${level}_misses`, cacheCounterKeys(level, 'misses')],
    [`${level}_accesses`, cacheCounterKeys(level, 'accesses')],
  ]),
  ['l1d_miss_latency', cacheCounterKeys('l1d', 'missLatency')],
  ['mem_reads', MEM_READ_KEYS],
  ['mem_writes', MEM_WRITE_KEYS],
  ['mem_bandwidth', MEM_BANDWIDTH_KEYS],
  ['branch_predicted', BRANCH_PREDICTED_KEYS],
  ['branch_mispreds', BRANCH_MISPREDICTED_KEYS],
])

export function isMetricAlias(name: string): boolean {
  return METRIC_ALIASES.has(name)
}

/** Value of an alias in one run, or undefined when none of its stats were logged. */
export function resolveAlias(name: string, metrics: MetricRecord): number | undefined {
  const keys = METRIC_ALIASES.get(name)
  return keys === undefined ? undefined : numericMetric(metrics, keys)
}
