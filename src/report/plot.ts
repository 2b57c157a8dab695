/**
 * Plot data and the renderer seam.
 *
 * Series are computed here; drawing is delegated to a {@link PlotRenderer}.
 * The default renderer pulls in React and recharts, so it is imported lazily
 * and its absence is reported as `null` rather than an exception.
 */

import path from 'node:path'
import type { SplitBy } from '../config.js'
import type { ResultEntry, ResultSet } from '../types.js'
import type { Axis } from '../results/axes.js'
import { sortCategories, type CategoryValue } from '../results/result-set.js'
import { describeError } from '../error-utils.js'
import { splitEntries } from './split.js'
import { formatCategory } from './table.js'

export interface PlotPoint {
  readonly x: number
  readonly y: number
}

export interface PlotSeries {
  readonly name: string
  /** Sorted by x ascending. */
  readonly points: readonly PlotPoint[]
}

/** Axis tick for categorical x axes, placed at the category's ordinal. */
export interface PlotTick {
  readonly value: number
  readonly label: string
}

export interface PlotData {
  readonly title: string
  readonly xLabel: string
  readonly yLabel: string
  readonly series: readonly PlotSeries[]
  readonly xTicks?: readonly PlotTick[]
  /** Capacities span orders of magnitude and are drawn on a base-2 log scale. */
  readonly logScaleX: boolean
}

export interface PlotRenderer {
  render(plot: PlotData, outputPath: string): Promise<void>
}

/** `plot_<x>_vs_<y>.svg`, with characters outside `[A-Za-z0-9._-]` replaced by `_`. */
export function plotFileName(xAxis: string, yAxis: string): string {
  return `plot_${xAxis}_vs_${yAxis}.svg`.replace(/[^A-Za-z0-9._-]/g, '_')
}

export function plotOutputPath(outputDir: string, xAxis: string, yAxis: string): string {
  return path.join(outputDir, plotFileName(xAxis, yAxis))
}

function categoricalPositions(entries: readonly ResultEntry[], xAxis: Axis): {
  position: (entry: ResultEntry) => number | undefined
  ticks: PlotTick[]
} {
  const categories = sortCategories(new Set(entries.map(xAxis.category)))
  const ordinals = new Map<CategoryValue, number>(categories.map((category, index) => [category, index]))
  return {
    position: (entry) => ordinals.get(xAxis.category(entry)),
    ticks: categories.map((category, index) => ({ value: index, label: formatCategory(category) })),
  }
}

/**
 * One series per split group; runs whose x or y value is missing are dropped
 * and series left without points are omitted.
 */
export function buildPlotData(
  resultSet: ResultSet,
  xAxis: Axis,
  yAxis: Axis,
  splitBy: SplitBy
): PlotData {
  const categorical = xAxis.kind === 'categorical' ? categoricalPositions(resultSet.entries, xAxis) : undefined
  const xOf = categorical?.position ?? xAxis.numeric

  const series: PlotSeries[] = []
  for (const group of splitEntries(resultSet.entries, splitBy)) {
    const points: PlotPoint[] = []
    for (const entry of group.entries) {
      const x = xOf(entry)
      const y = yAxis.numeric(entry)
      if (x === undefined || y === undefined || !Number.isFinite(x) || !Number.isFinite(y)) continue
      points.push({ x, y })
    }
    if (points.length === 0) continue
    points.sort((a, b) => a.x - b.x)
    series.push({ name: group.title, points })
  }

  const logScaleX =
    xAxis.kind === 'capacity' && series.every((s) => s.points.every((point) => point.x > 0))

  return {
    title: `${yAxis.label} vs ${xAxis.label}`,
    xLabel: xAxis.label,
    yLabel: yAxis.label,
    series,
    ...(categorical !== undefined ? { xTicks: categorical.ticks } : {}),
    logScaleX,
  }
}

/**
 * Loads the SVG renderer. Returns null, with a warning, when its modules
 * cannot be imported.
 */
export async function loadDefaultRenderer(): Promise<PlotRenderer | null> {
  try {
    const { SvgPlotRenderer } = await import('./svg-renderer.js')
    return new SvgPlotRenderer()
  } catch (err) {
    console.warn(`[sweepstat] plot: renderer unavailable: ${describeError(err)}`)
    return null
  }
}
