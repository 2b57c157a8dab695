import { describe, it, expect } from 'vitest'
import { createResultEntry, EMPTY_SUMMARY, type ResultEntry, type ResultSet } from '../../src/types.js'
import {
  availableParameters,
  compareCategories,
  groupBy,
  groupByApplication,
  parameterNames,
  sortCategories,
  summarize,
} from '../../src/results/result-set.js'

const diagnostics = { rootFound: true, logFilesFound: 2, unreadableLogs: 0, emptyLogs: 0, malformedLines: 0, conflicts: 0 }

const mm16 = createResultEntry('mm16/stats.txt', { simInsts: 1000, 'system.cpu.numCycles': 2000 }, {
  application: 'matrix_mult',
  cache_size: '16kB',
})
const hash = createResultEntry(
  'hash/stats.txt',
  { simInsts: 3000, 'system.cpu.numCycles': 2000, 'system.cpu.type': 'O3' },
  { application: 'hash_ops' }
)
const mm32 = createResultEntry('mm32/stats.txt', { simInsts: 1500, 'system.cpu.numCycles': 2000 }, {
  application: 'matrix_mult',
  cache_size: '32kB',
})
const anonymous = createResultEntry('anon/stats.txt', { simTicks: 10 }, {})

function resultSetOf(...entries: ResultEntry[]): ResultSet {
  return { root: '/results', entries, diagnostics }
}

// ---------------------------------------------------------------------------
// groupBy
// ---------------------------------------------------------------------------

describe('groupBy', () => {
  it('partitions entries disjointly and exhaustively', () => {
    const entries = [mm16, hash, mm32]
    const groups = groupByApplication(entries)

    expect([...groups.keys()]).toEqual(['matrix_mult', 'hash_ops'])
    expect(groups.get('matrix_mult')).toEqual([mm16, mm32])
    expect(groups.get('hash_ops')).toEqual([hash])

    const members = [...groups.values()].flat()
    expect(members).toHaveLength(entries.length)
    expect(new Set(members)).toEqual(new Set(entries))
  })

  it('puts entries without an application in the unknown group', () => {
    expect([...groupByApplication([mm16, anonymous]).keys()]).toEqual(['matrix_mult', 'unknown'])
  })

  it('accepts any key function', () => {
    const groups = groupBy([mm16, hash, mm32], (entry) => entry.config.cache_size !== undefined)
    expect(groups.get(true)).toEqual([mm16, mm32])
    expect(groups.get(false)).toEqual([hash])
  })
})

// ---------------------------------------------------------------------------
// summarize
// ---------------------------------------------------------------------------

describe('summarize', () => {
  const instructions = (entry: ResultEntry): number | undefined => {
    const value = entry.metrics['simInsts']
    return typeof value === 'number' ? value : undefined
  }

  it('computes mean, min, max and count', () => {
    expect(summarize([mm16, hash, mm32], instructions)).toEqual({ count: 3, mean: 1833.3333333333333, min: 1000, max: 3000 })
  })

  it('leaves out entries without a value', () => {
    expect(summarize([mm16, anonymous], instructions)).toEqual({ count: 1, mean: 1000, min: 1000, max: 1000 })
  })

  it('returns the empty sentinel for an empty group', () => {
    expect(summarize([], instructions)).toBe(EMPTY_SUMMARY)
    expect(summarize([anonymous], instructions)).toBe(EMPTY_SUMMARY)
    expect(EMPTY_SUMMARY.count).toBe(0)
    expect(EMPTY_SUMMARY.mean).toBeNaN()
  })

  it('skips non-finite values', () => {
    expect(summarize([mm16, hash], (entry) => (entry === hash ? Number.POSITIVE_INFINITY : 1)).count).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// category ordering
// ---------------------------------------------------------------------------

describe('compareCategories', () => {
  it('sorts capacities by size, not spelling', () => {
    expect(sortCategories(['2kB', '64kB', '128kB', '16kB'])).toEqual(['2kB', '16kB', '64kB', '128kB'])
    expect(sortCategories(['1MB', '512kB', '2MB'])).toEqual(['512kB', '1MB', '2MB'])
  })

  it('orders numbers, capacities, booleans, strings, then unknown', () => {
    expect(sortCategories([true, 'unknown', 'beta', 4, '1MB', false, 2])).toEqual([
      2,
      4,
      '1MB',
      false,
      true,
      'beta',
      'unknown',
    ])
  })

  it('breaks ties between equal capacities lexicographically', () => {
    expect(compareCategories('1024kB', '1MB')).toBeLessThan(0)
    expect(compareCategories('32kB', '32kB')).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// availableParameters
// ---------------------------------------------------------------------------

describe('availableParameters', () => {
  it('lists config keys, derived metrics, resolvable aliases and raw stats', () => {
    expect(parameterNames(resultSetOf(mm16, hash))).toEqual([
      'application',
      'cache_size',
      'ipc',
      'cpi',
      'l1d_miss_rate',
      'l1i_miss_rate',
      'l2_miss_rate',
      'l3_miss_rate',
      'branch_accuracy',
      'execution_time',
      'num_cycles',
      'sim_insts',
      'simInsts',
      'system.cpu.numCycles',
      'system.cpu.type',
    ])
  })

  it('samples values from the first runs', () => {
    const byName = new Map(availableParameters(resultSetOf(mm16, hash)).map((info) => [info.name, info]))
    expect(byName.get('application')).toEqual({ name: 'application', kind: 'config', samples: ['matrix_mult', 'hash_ops'] })
    expect(byName.get('cache_size')?.samples).toEqual(['16kB', 'N/A'])
    expect(byName.get('cpi')?.samples).toEqual(['2', '0.666667'])
    expect(byName.get('system.cpu.type')).toEqual({ name: 'system.cpu.type', kind: 'metric', samples: ['N/A', 'O3'] })
  })

  it('keeps the first kind when a raw stat shares a derived name', () => {
    const entry = createResultEntry('x/stats.txt', { ipc: 3 }, {})
    const ipc = availableParameters(resultSetOf(entry)).filter((info) => info.name === 'ipc')
    expect(ipc.map((info) => info.kind)).toEqual(['derived'])
  })

  it('returns nothing for an empty set', () => {
    expect(availableParameters(resultSetOf())).toEqual([])
  })
})
