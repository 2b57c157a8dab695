import { describe, it, expect } from 'vitest'
import { createResultEntry, type ConfigRecord, type ResultEntry, type ResultSet } from '../../src/types.js'
import { resolveAxis } from '../../src/results/axes.js'
import { buildPlotData, plotFileName, plotOutputPath } from '../../src/report/plot.js'
import { renderPlotSvg } from '../../src/report/svg-renderer.js'

const diagnostics = { rootFound: true, logFilesFound: 5, unreadableLogs: 0, emptyLogs: 0, malformedLines: 0, conflicts: 0 }

function run(name: string, instructions: number, config: ConfigRecord): ResultEntry {
  return createResultEntry(`${name}/stats.txt`, { simInsts: instructions, 'system.cpu.numCycles': 2000 }, config)
}

function resultSetOf(...entries: ResultEntry[]): ResultSet {
  return { root: '/results', entries, diagnostics }
}

const sweep = resultSetOf(
  run('mm64b', 1800, { application: 'matrix_mult', cache_size: '64kB', optimized: true }),
  run('mm16', 1000, { application: 'matrix_mult', cache_size: '16kB' }),
  run('mm64', 2000, { application: 'matrix_mult', cache_size: '64kB', optimized: false }),
  run('hash16', 3000, { application: 'hash_ops', cache_size: '16kB', optimized: true }),
  run('mm32', 1500, { application: 'matrix_mult', cache_size: '32kB' }),
)

describe('plotFileName', () => {
  it('derives the file name from both axes', () => {
    expect(plotFileName('l1d_size', 'ipc')).toBe('plot_l1d_size_vs_ipc.svg')
  })

  it('replaces characters outside the safe set', () => {
    expect(plotFileName('system.cpu.type', 'a/b c')).toBe('plot_system.cpu.type_vs_a_b_c.svg')
  })

  it('joins the output directory', () => {
    expect(plotOutputPath('/out', 'l1d_size', 'ipc')).toBe('/out/plot_l1d_size_vs_ipc.svg')
  })
})

describe('buildPlotData', () => {
  it('draws one series per optimization flag with points sorted by x', () => {
    const plot = buildPlotData(sweep, resolveAxis('l1d_size', sweep, 'x'), resolveAxis('ipc', sweep, 'y'), 'optimized')

    expect(plot.title).toBe('Instructions Per Cycle (IPC) vs L1D Size (KB)')
    expect(plot.logScaleX).toBe(true)
    expect(plot.xTicks).toBeUndefined()
    expect(plot.series).toEqual([
      { name: 'Unoptimized', points: [{ x: 16, y: 0.5 }, { x: 32, y: 0.75 }, { x: 64, y: 1 }] },
      { name: 'Optimized', points: [{ x: 16, y: 1.5 }, { x: 64, y: 0.9 }] },
    ])
  })

  it('draws one series per application', () => {
    const plot = buildPlotData(sweep, resolveAxis('l1d_size', sweep, 'x'), resolveAxis('ipc', sweep, 'y'), 'application')
    expect(plot.series.map((s) => [s.name, s.points.length])).toEqual([
      ['hash_ops', 1],
      ['matrix_mult', 4],
    ])
  })

  it('maps a categorical x axis to ordinals with tick labels', () => {
    const plot = buildPlotData(sweep, resolveAxis('application', sweep, 'x'), resolveAxis('ipc', sweep, 'y'), 'none')

    expect(plot.logScaleX).toBe(false)
    expect(plot.xTicks).toEqual([
      { value: 0, label: 'hash_ops' },
      { value: 1, label: 'matrix_mult' },
    ])
    expect(plot.series[0]?.points).toEqual([
      { x: 0, y: 1.5 },
      { x: 1, y: 0.9 },
      { x: 1, y: 0.5 },
      { x: 1, y: 1 },
      { x: 1, y: 0.75 },
    ])
  })

  it('drops runs without an x value and omits empty series', () => {
    const unsized = run('bare', 1000, { optimized: true })
    const set = resultSetOf(run('mm16', 1000, { cache_size: '16kB' }), unsized)
    const plot = buildPlotData(set, resolveAxis('l1d_size', set, 'x'), resolveAxis('ipc', set, 'y'), 'optimized')
    expect(plot.series).toEqual([{ name: 'Unoptimized', points: [{ x: 16, y: 0.5 }] }])
  })
})

describe('renderPlotSvg', () => {
  it('produces a standalone SVG document with title and legend', () => {
    const plot = buildPlotData(sweep, resolveAxis('l1d_size', sweep, 'x'), resolveAxis('ipc', sweep, 'y'), 'optimized')
    const svg = renderPlotSvg(plot)

    expect(svg.startsWith('<svg')).toBe(true)
    expect(svg.endsWith('</svg>')).toBe(true)
    expect(svg).toContain('xmlns="http://www.w3.org/2000/svg"')
    expect(svg).toContain('>Instructions Per Cycle (IPC) vs L1D Size (KB)</text>')
    expect(svg).toContain('>Unoptimized</text>')
    expect(svg).toContain('>Optimized</text>')
  })
})
