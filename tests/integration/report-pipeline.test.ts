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

import { collect } from '../../src/results/collect.js'
import { resolveAxis } from '../../src/results/axes.js'
import { buildTableSections } from '../../src/report/table.js'
import { runReport } from '../../src/report/report.js'
import { UnknownParameterError } from '../../src/errors.js'

// ---------------------------------------------------------------------------
// Fixture: two kernels swept over three L1D capacities, two runs per point
// ---------------------------------------------------------------------------

const CYCLES = 10_000

function statsFile(insts: number): string {
  return [
    '---------- Begin Simulation Statistics ----------',
    `simInsts ${insts} # Number of instructions simulated`,
    `system.cpu.numCycles ${CYCLES} # Number of cpu cycles simulated`,
    'simTicks 5000000 # Number of ticks simulated',
    '---------- End Simulation Statistics ----------',
  ].join('\n')
}

function seedResults(): void {
  const files: Record<string, string> = {}
  const capacities = ['16kB', '32kB', '64kB']
  capacities.forEach((capacity, index) => {
    files[`/results/matrix_mult/${capacity}/run1/stats.txt`] = statsFile(4000 + index * 1000)
    files[`/results/matrix_mult/${capacity}/run2/stats.txt`] = statsFile(4200 + index * 1000)
    files[`/results/hash_ops/${capacity}/run1/stats.txt`] = statsFile(6000 + index * 200)
  })
  vol.fromJSON(files)
}

describe('report pipeline', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>

  beforeEach(() => {
    vol.reset()
    seedResults()
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    warnSpy.mockRestore()
  })

  it('collects every run with application and capacity from the path', async () => {
    const resultSet = await collect('/results')

    expect(resultSet.entries).toHaveLength(9)
    expect(resultSet.diagnostics.conflicts).toBe(0)
    expect(resultSet.entries[0]?.sourcePath).toBe('hash_ops/16kB/run1/stats.txt')
    expect(resultSet.entries[0]?.config).toEqual({ application: 'hash_ops', cache_size: '16kB' })
  })

  it('mean IPC never decreases as the L1D capacity grows', async () => {
    const resultSet = await collect('/results')
    const table = buildTableSections(
      resultSet,
      resolveAxis('l1d_size', resultSet, 'x'),
      resolveAxis('ipc', resultSet, 'y'),
      'application'
    )

    expect(table.sections.map((section) => section.title)).toEqual(['hash_ops', 'matrix_mult'])
    for (const section of table.sections) {
      expect(section.rows.map((row) => row.category)).toEqual(['16kB', '32kB', '64kB'])
      const means = section.rows.map((row) => row.summary.mean)
      for (let i = 1; i < means.length; i++) {
        expect(means[i]).toBeGreaterThanOrEqual(means[i - 1] ?? Number.POSITIVE_INFINITY)
      }
    }

    const matrixRows = table.sections[1]?.rows ?? []
    expect(matrixRows.map((row) => row.summary.count)).toEqual([2, 2, 2])
    expect(matrixRows[0]?.summary.mean).toBeCloseTo(0.41, 10)
  })

  it('writes an SVG plot with the bundled renderer', async () => {
    const outcome = await runReport({ resultsDir: '/results', xAxis: 'l1d_size', yAxis: 'ipc', mode: 'plot' })

    expect(outcome.mode).toBe('plot')
    expect(outcome.plotPath).toBe('/results/plot_l1d_size_vs_ipc.svg')
    const svg = String(vol.readFileSync('/results/plot_l1d_size_vs_ipc.svg', 'utf-8'))
    expect(svg.startsWith('<svg')).toBe(true)
    expect(svg).toContain('>matrix_mult</text>')
    expect(svg).toContain('>hash_ops</text>')
  })

  it('keeps runs named <application>_<capacity> in one section', async () => {
    vol.fromJSON({
      '/named/matrix_mult_16kB/stats.txt': statsFile(4000),
      '/named/matrix_mult_32kB/stats.txt': statsFile(5000),
      '/named/matrix_mult_64kB/stats.txt': statsFile(6000),
    })

    const outcome = await runReport({ resultsDir: '/named', xAxis: 'l1d_size', yAxis: 'ipc', mode: 'table' })

    const lines = outcome.output.split('\n')
    expect(lines.filter((line) => line.endsWith(' RESULTS:'))).toEqual(['MATRIX_MULT RESULTS:'])
    expect(lines.slice(8, 11).map((line) => line.split(/\s+/).slice(0, 2))).toEqual([
      ['16kB', '0.4000'],
      ['32kB', '0.5000'],
      ['64kB', '0.6000'],
    ])
  })

  it('an unknown axis produces no output files', async () => {
    await expect(
      runReport({ resultsDir: '/results', xAxis: 'ipc', yAxis: 'l2_hit_ratio', mode: 'plot' })
    ).rejects.toThrow(UnknownParameterError)

    expect(Object.keys(vol.toJSON()).filter((file) => !file.endsWith('stats.txt'))).toEqual([])
  })
})
