import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest'
import { vol } from 'memfs'

vi.mock('node:fs', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs, ...m.fs }
})
vi.mock('node:fs/promises', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs.promises, ...m.fs.promises }
})

import { parseConfig, defaultConfig, loadConfigFile, ConfigValidationError } from '../../src/config.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Asserts the function throws a ConfigValidationError mentioning `fieldPath`. */
function expectFieldError(fn: () => unknown, fieldPath: string): void {
  expect(fn).toThrow(ConfigValidationError)
  expect(fn).toThrow(fieldPath)
}

// ---------------------------------------------------------------------------
// Default values
// ---------------------------------------------------------------------------

describe('parseConfig: defaults', () => {
  it('empty object → all defaults applied', () => {
    const result = parseConfig({})

    expect(result.logFiles.patterns).toEqual(['^stats\\.txt$', '^stats_.+\\.txt$'])
    expect(result.parser.commentPrefixes).toEqual(['#'])
    expect(result.extraction.applications).toEqual(['matrix_mult', 'image_blur', 'hash_ops', 'stream_bench'])
    expect(result.extraction.noCacheCapacity).toBe('256kB')
    expect(result.extraction.applicationMatch).toBe('name')
    expect(result.extraction.conflictPolicy).toBe('first-match')
    expect(result.derived.nominalClockGhz).toBe(2)
    expect(result.report).toEqual({ splitBy: 'application', columnWidth: 12, precision: 4 })
    expect(result.metrics).toEqual({ emit: false, fileSink: false })
  })

  it('null and undefined → defaults', () => {
    expect(parseConfig(null)).toEqual(defaultConfig())
    expect(parseConfig(undefined)).toEqual(defaultConfig())
  })

  it('partial input → unspecified fields get defaults', () => {
    const result = parseConfig({ report: { splitBy: 'optimized' }, derived: { nominalClockGhz: 3 } })

    expect(result.report.splitBy).toBe('optimized')
    expect(result.report.columnWidth).toBe(12)
    expect(result.derived.nominalClockGhz).toBe(3)
    expect(result.extraction.conflictPolicy).toBe('first-match')
  })

  it('unknown top-level and nested keys → stripped and reported via onUnknownKeys', () => {
    let capturedKeys: readonly string[] = []
    const result = parseConfig(
      { unknownTopLevel: 'stripped', report: { precision: 2, unknownField: true } },
      { onUnknownKeys: (keys) => { capturedKeys = keys } }
    )
    expect(Object.keys(result)).not.toContain('unknownTopLevel')
    expect(result.report.precision).toBe(2)
    expect(capturedKeys).toEqual(['unknownTopLevel', 'report.unknownField'])
  })

  it('clean input → onUnknownKeys is not called', () => {
    let called = false
    parseConfig({ metrics: { emit: true } }, { onUnknownKeys: () => { called = true } })
    expect(called).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('parseConfig: validation', () => {
  it('rejects a pattern that does not compile', () => {
    expectFieldError(() => parseConfig({ logFiles: { patterns: ['('] } }), 'logFiles.patterns[0]')
  })

  it('rejects an empty pattern list', () => {
    expectFieldError(() => parseConfig({ logFiles: { patterns: [] } }), 'logFiles.patterns')
  })

  it('rejects a capacity without a unit', () => {
    expectFieldError(() => parseConfig({ extraction: { noCacheCapacity: '256' } }), 'extraction.noCacheCapacity')
  })

  it('rejects an unknown conflict policy', () => {
    expectFieldError(() => parseConfig({ extraction: { conflictPolicy: 'random' } }), 'extraction.conflictPolicy')
  })

  it('rejects a non-positive nominal clock', () => {
    expectFieldError(() => parseConfig({ derived: { nominalClockGhz: 0 } }), 'derived.nominalClockGhz')
  })

  it('rejects out-of-range report settings', () => {
    expectFieldError(() => parseConfig({ report: { columnWidth: 3 } }), 'report.columnWidth')
    expectFieldError(() => parseConfig({ report: { precision: 1.5 } }), 'report.precision')
  })

  it('lists every failing field', () => {
    let caught: unknown
    try {
      parseConfig({ report: { splitBy: 'cpu', columnWidth: 100 } })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ConfigValidationError)
    if (!(caught instanceof ConfigValidationError)) return
    expect(caught.issues).toHaveLength(2)
    expect(caught.message.startsWith('sweepstat configuration is invalid:\n')).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// loadConfigFile
// ---------------------------------------------------------------------------

describe('loadConfigFile', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>

  beforeEach(() => {
    vol.reset()
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    warnSpy.mockRestore()
  })

  it('reads YAML and applies defaults', async () => {
    vol.fromJSON({
      '/cfg/sweepstat.yaml': [
        'report:',
        '  splitBy: optimized',
        'extraction:',
        '  conflictPolicy: last-match',
        '  applications: [fft]',
      ].join('\n'),
    })

    const config = await loadConfigFile('/cfg/sweepstat.yaml')

    expect(config.report.splitBy).toBe('optimized')
    expect(config.extraction.conflictPolicy).toBe('last-match')
    expect(config.extraction.applications).toEqual(['fft'])
    expect(config.report.precision).toBe(4)
    expect(warnSpy).not.toHaveBeenCalled()
  })

  it('warns about unknown keys', async () => {
    vol.fromJSON({ '/cfg/sweepstat.yaml': 'report:\n  typo: 1\n' })
    await loadConfigFile('/cfg/sweepstat.yaml')
    expect(warnSpy).toHaveBeenCalledWith('[sweepstat] config: ignoring unknown keys in /cfg/sweepstat.yaml: report.typo')
  })

  it('returns defaults with a warning when the file is missing', async () => {
    const config = await loadConfigFile('/cfg/none.yaml')
    expect(config).toEqual(defaultConfig())
    expect(warnSpy).toHaveBeenCalledWith('[sweepstat] config: /cfg/none.yaml not found, using defaults')
  })

  it('treats an empty file as the defaults', async () => {
    vol.fromJSON({ '/cfg/empty.yaml': '' })
    expect(await loadConfigFile('/cfg/empty.yaml')).toEqual(defaultConfig())
  })

  it('throws ConfigValidationError for invalid values', async () => {
    vol.fromJSON({ '/cfg/bad.yaml': 'derived:\n  nominalClockGhz: -1\n' })
    await expect(loadConfigFile('/cfg/bad.yaml')).rejects.toThrow(ConfigValidationError)
  })
})
