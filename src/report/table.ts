/**
 * Tabular report: one section per split group, one row per x-axis category,
 * summarising the y-axis metric.
 */

import type { SplitBy } from '../config.js'
import type { ResultSet, Summary } from '../types.js'
import type { Axis } from '../results/axes.js'
import { groupBy, sortCategories, summarize, type CategoryValue } from '../results/result-set.js'
import { splitEntries } from './split.js'

export interface TableRow {
  readonly category: CategoryValue
  readonly summary: Summary
  /** True when any value in the row is an estimate. */
  readonly estimated: boolean
}

export interface TableSection {
  readonly title: string
  readonly rows: readonly TableRow[]
}

export interface TableReport {
  readonly xAxis: string
  readonly yAxis: string
  readonly totalResults: number
  readonly sections: readonly TableSection[]
}

export interface TableRenderOptions {
  /** Width of the label, average, min and max columns. Default 12. */
  readonly columnWidth?: number
  /** Decimal places for summary values. Default 4. */
  readonly precision?: number
}

const COUNT_WIDTH = 6
const HEAVY_RULE = '='.repeat(70)
const LIGHT_RULE = '-'.repeat(50)
export const ESTIMATED_MARKER = ' (estimated)'

/** Groups the runs into sections and rows, categories in {@link sortCategories} order. */
export function buildTableSections(
  resultSet: ResultSet,
  xAxis: Axis,
  yAxis: Axis,
  splitBy: SplitBy
): TableReport {
  const sections = splitEntries(resultSet.entries, splitBy).map((group): TableSection => {
    const byCategory = groupBy(group.entries, xAxis.category)
    const rows = sortCategories(byCategory.keys()).map((category): TableRow => {
      const members = byCategory.get(category) ?? []
      return {
        category,
        summary: summarize(members, yAxis.numeric),
        estimated: members.some((entry) => xAxis.isEstimated(entry) || yAxis.isEstimated(entry)),
      }
    })
    return { title: group.title, rows }
  })

  return {
    xAxis: xAxis.name,
    yAxis: yAxis.name,
    totalResults: resultSet.entries.length,
    sections,
  }
}

/** Category label for a table cell. */
export function formatCategory(value: CategoryValue): string {
  if (typeof value === 'number') return String(Number(value.toPrecision(6)))
  return String(value)
}

function formatValue(value: number, precision: number): string {
  return Number.isNaN(value) ? '-' : value.toFixed(precision)
}

function formatLine(cells: readonly string[], count: string, width: number): string {
  return [...cells.map((cell) => cell.padEnd(width)), count.padEnd(COUNT_WIDTH)].join(' ').trimEnd()
}

/** Renders the report as plain text lines joined with "\n". */
export function renderTable(report: TableReport, options: TableRenderOptions = {}): string {
  const width = options.columnWidth ?? 12
  const precision = options.precision ?? 4

  const lines: string[] = [
    HEAVY_RULE,
    `Performance Analysis: ${report.yAxis} vs ${report.xAxis}`,
    HEAVY_RULE,
  ]

  for (const section of report.sections) {
    lines.push(
      '',
      `${section.title.toUpperCase()} RESULTS:`,
      LIGHT_RULE,
      formatLine(['Config', 'Average', 'Min', 'Max'], 'Count', width),
      LIGHT_RULE,
    )
    for (const row of section.rows) {
      const { mean, min, max, count } = row.summary
      const line = formatLine(
        [
          formatCategory(row.category),
          formatValue(mean, precision),
          formatValue(min, precision),
          formatValue(max, precision),
        ],
        String(count),
        width
      )
      lines.push(row.estimated ? line + ESTIMATED_MARKER : line)
    }
  }

  const configurations = report.sections.reduce((total, section) => total + section.rows.length, 0)
  lines.push(
    '',
    'SUMMARY:',
    LIGHT_RULE,
    `Total results: ${report.totalResults}`,
    `Groups: ${report.sections.length}`,
    `Total configurations: ${configurations}`,
  )
  return lines.join('\n')
}
