/**
 * Report orchestration: collect, check the set is usable, resolve both axes,
 * then produce a table or a plot.
 *
 * Axis names are validated before anything is written, so a bad request
 * leaves no partial output behind. A plot that cannot be drawn degrades to
 * the table with a notice.
 */

import { defaultConfig, type SplitBy, type SweepstatConfig } from '../config.js'
import { EmptyResultSetError } from '../errors.js'
import { createMetricEvent, recordMetric } from '../metrics/index.js'
import { collect } from '../results/collect.js'
import { resolveAxis, type Axis } from '../results/axes.js'
import { availableParameters, type ParameterInfo } from '../results/result-set.js'
import type { ResultSet } from '../types.js'
import { describeError } from '../error-utils.js'
import { buildPlotData, loadDefaultRenderer, plotOutputPath, type PlotRenderer } from './plot.js'
import { buildTableSections, renderTable, type TableReport } from './table.js'
import { renderSweepSummary, summarizeSweep } from './summary.js'

export type ReportMode = 'table' | 'plot'

export interface ReportRequest {
  readonly resultsDir: string
  readonly xAxis: string
  readonly yAxis: string
  readonly mode: ReportMode
  /** Overrides `report.splitBy` from the configuration. */
  readonly splitBy?: SplitBy
  /** Where plots and the metrics file go. Defaults to the results directory. */
  readonly outputDir?: string
  /** Append the per-application sweep summary. */
  readonly summary?: boolean
}

export interface ReportDeps {
  readonly config?: SweepstatConfig
  readonly loadRenderer?: () => Promise<PlotRenderer | null>
}

export interface ReportOutcome {
  readonly mode: 'table' | 'plot' | 'table-fallback'
  /** Text for stdout; empty when only a plot was written. */
  readonly output: string
  readonly plotPath?: string
  /** Shown to the user when a requested plot fell back to the table. */
  readonly notice?: string
}

/** @throws {EmptyResultSetError} when collection produced no entries. */
function requireEntries(resultSet: ResultSet): void {
  if (!resultSet.diagnostics.rootFound) throw new EmptyResultSetError(resultSet.root, 'missing-root')
  if (resultSet.entries.length === 0) throw new EmptyResultSetError(resultSet.root, 'no-logs')
}

function countEstimated(resultSet: ResultSet, xAxis: Axis, yAxis: Axis): number {
  return resultSet.entries.filter((entry) => xAxis.isEstimated(entry) || yAxis.isEstimated(entry)).length
}

function countCategories(table: TableReport): number {
  const categories = new Set(table.sections.flatMap((section) => section.rows.map((row) => row.category)))
  return categories.size
}

async function tryPlot(
  resultSet: ResultSet,
  xAxis: Axis,
  yAxis: Axis,
  splitBy: SplitBy,
  outputPath: string,
  loadRenderer: () => Promise<PlotRenderer | null>
): Promise<string | null> {
  const renderer = await loadRenderer()
  if (renderer === null) return 'Plot renderer unavailable; showing table instead.'
  try {
    await renderer.render(buildPlotData(resultSet, xAxis, yAxis, splitBy), outputPath)
    return null
  } catch (err) {
    console.warn(`[sweepstat] report: rendering ${outputPath} failed: ${describeError(err)}`)
    return `Plot rendering failed (${describeError(err)}); showing table instead.`
  }
}

/**
 * Runs one report request end to end.
 *
 * @throws {EmptyResultSetError} when the results tree yields no entries.
 * @throws {UnknownParameterError} when either axis name is not recognised.
 */
export async function runReport(request: ReportRequest, deps: ReportDeps = {}): Promise<ReportOutcome> {
  const config = deps.config ?? defaultConfig()
  const outputDir = request.outputDir ?? request.resultsDir
  const splitBy = request.splitBy ?? config.report.splitBy

  const resultSet = await collect(request.resultsDir, config)
  requireEntries(resultSet)

  const deriveOptions = { nominalClockGhz: config.derived.nominalClockGhz }
  const xAxis = resolveAxis(request.xAxis, resultSet, 'x', deriveOptions)
  const yAxis = resolveAxis(request.yAxis, resultSet, 'y', deriveOptions)

  await recordMetric(config.metrics, outputDir, createMetricEvent({
    stage: 'collect',
    root: resultSet.root,
    rootFound: resultSet.diagnostics.rootFound,
    logFilesFound: resultSet.diagnostics.logFilesFound,
    entriesCollected: resultSet.entries.length,
    unreadableLogs: resultSet.diagnostics.unreadableLogs,
    emptyLogs: resultSet.diagnostics.emptyLogs,
    malformedLines: resultSet.diagnostics.malformedLines,
    conflicts: resultSet.diagnostics.conflicts,
  }))

  const table = buildTableSections(resultSet, xAxis, yAxis, splitBy)
  const summaryText = request.summary === true ? renderSweepSummary(summarizeSweep(resultSet, deriveOptions)) : ''
  const tableText = [renderTable(table, config.report), summaryText].filter((part) => part !== '').join('\n\n')

  let outcome: ReportOutcome
  if (request.mode === 'plot') {
    const plotPath = plotOutputPath(outputDir, xAxis.name, yAxis.name)
    const notice = await tryPlot(resultSet, xAxis, yAxis, splitBy, plotPath, deps.loadRenderer ?? loadDefaultRenderer)
    outcome = notice === null
      ? { mode: 'plot', output: summaryText, plotPath }
      : { mode: 'table-fallback', output: tableText, notice }
  } else {
    outcome = { mode: 'table', output: tableText }
  }

  await recordMetric(config.metrics, outputDir, createMetricEvent({
    stage: 'report',
    xAxis: xAxis.name,
    yAxis: yAxis.name,
    mode: outcome.mode,
    sections: table.sections.length,
    categories: countCategories(table),
    estimatedValues: countEstimated(resultSet, xAxis, yAxis),
  }))
  return outcome
}

/**
 * Every parameter the runs under `resultsDir` provide.
 *
 * @throws {EmptyResultSetError} when the results tree yields no entries.
 */
export async function listParameters(
  resultsDir: string,
  config: SweepstatConfig = defaultConfig()
): Promise<readonly ParameterInfo[]> {
  const resultSet = await collect(resultsDir, config)
  requireEntries(resultSet)
  return availableParameters(resultSet)
}

export function renderParameterList(parameters: readonly ParameterInfo[]): string {
  const width = parameters.reduce((max, info) => Math.max(max, info.name.length), 0)
  const lines = [`Available parameters (${parameters.length}):`]
  for (const info of parameters) {
    lines.push(`  ${info.name.padEnd(width)}  ${info.kind.padEnd(7)}  e.g. ${info.samples.join(', ')}`)
  }
  return lines.join('\n')
}
