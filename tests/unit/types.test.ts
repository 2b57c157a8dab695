import { describe, it, expect } from 'vitest'
import { CONFIG_KEYS, EMPTY_SUMMARY, createResultEntry, isConfigKey, metricValue } from '../../src/types.js'

describe('isConfigKey', () => {
  it('returns true for every configuration key', () => {
    for (const key of CONFIG_KEYS) {
      expect(isConfigKey(key)).toBe(true)
    }
  })

  it('returns false for stat names and near misses', () => {
    expect(isConfigKey('simInsts')).toBe(false)
    expect(isConfigKey('L1D_SIZE')).toBe(false)
    expect(isConfigKey('l1d_size ')).toBe(false) // trailing space
  })
})

describe('createResultEntry', () => {
  it('copies and freezes metrics and config', () => {
    const metrics: Record<string, number> = { simInsts: 100 }
    const entry = createResultEntry('a/stats.txt', metrics, { application: 'fft' })

    metrics['simInsts'] = 1
    expect(entry.metrics).toEqual({ simInsts: 100 })
    expect(Object.isFrozen(entry)).toBe(true)
    expect(Object.isFrozen(entry.metrics)).toBe(true)
    expect(Object.isFrozen(entry.config)).toBe(true)
  })
})

describe('EMPTY_SUMMARY', () => {
  it('has a zero count and NaN statistics', () => {
    expect(EMPTY_SUMMARY.count).toBe(0)
    expect(Number.isNaN(EMPTY_SUMMARY.mean)).toBe(true)
    expect(Number.isNaN(EMPTY_SUMMARY.min)).toBe(true)
    expect(Number.isNaN(EMPTY_SUMMARY.max)).toBe(true)
  })
})

describe('metricValue', () => {
  it('reads own keys only', () => {
    const metrics = { simInsts: 100 }
    expect(metricValue(metrics, 'simInsts')).toBe(100)
    expect(metricValue(metrics, 'toString')).toBeUndefined()
    expect(metricValue(metrics, 'constructor')).toBeUndefined()
  })
})
