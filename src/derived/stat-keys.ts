/**
 * Stat names the derivations read. Each list holds the newer camelCase name
 * first and the older snake_case spelling after it; the first numeric hit wins.
 */

import type { CacheLevel } from '../types.js'

export const INSTRUCTION_KEYS = ['simInsts', 'sim_insts', 'system.cpu.committedInsts', 'system.cpu.committed_insts'] as const
export const CYCLE_KEYS = ['system.cpu.numCycles', 'system.cpu.num_cycles'] as const
export const TICK_KEYS = ['simTicks', 'sim_ticks'] as const
export const SECONDS_KEYS = ['simSeconds', 'sim_seconds'] as const
export const HOST_SECONDS_KEYS = ['hostSeconds', 'host_seconds'] as const
export const IPC_KEYS = ['system.cpu.ipc', 'system.cpu.ipc_total'] as const
export const CPI_KEYS = ['system.cpu.cpi', 'system.cpu.cpi_total'] as const

export const BRANCH_PREDICTED_KEYS = ['system.cpu.branchPred.condPredicted', 'system.cpu.branchPred.cond_predicted'] as const
export const BRANCH_MISPREDICTED_KEYS = ['system.cpu.branchPred.condIncorrect', 'system.cpu.branchPred.cond_incorrect'] as const

export const MEM_READ_KEYS = ['system.mem_ctrl.dram.readReqs', 'system.mem_ctrl.readReqs'] as const
export const MEM_WRITE_KEYS = ['system.mem_ctrl.dram.writeReqs', 'system.mem_ctrl.writeReqs'] as const
export const MEM_BANDWIDTH_KEYS = ['system.mem_ctrl.dram.avgBW::total', 'system.mem_ctrl.dram.bwTotal::total'] as const

const CACHE_PREFIXES: Readonly<Record<CacheLevel, readonly string[]>> = {
  l1d: ['system.cpu.dcache'],
  l1i: ['system.cpu.icache'],
  l2: ['system.l2cache', 'system.l2'],
  l3: ['system.l3cache', 'system.l3'],
}

export type CacheCounter = 'hits' | 'misses' | 'accesses' | 'missRate' | 'missLatency'

const CACHE_COUNTER_SUFFIXES: Readonly<Record<CacheCounter, readonly string[]>> = {
  hits: ['overallHits::total', 'overall_hits::total'],
  misses: ['overallMisses::total', 'overall_misses::total'],
  accesses: ['overallAccesses::total', 'overall_accesses::total'],
  missRate: ['overallMissRate::total', 'overall_miss_rate::total'],
  missLatency: ['overallMissLatency::total', 'overall_miss_latency::total'],
}

/** Candidate stat names for one counter of one cache level. */
export function cacheCounterKeys(level: CacheLevel, counter: CacheCounter): readonly string[] {
  return CACHE_PREFIXES[level].flatMap((prefix) =>
    CACHE_COUNTER_SUFFIXES[counter].map((suffix) => `${prefix}.${suffix}`)
  )
}
