/**
 * Per-application sweep summary: how far IPC moves across the runs and
 * which cache capacity did best and worst.
 */

import { UNKNOWN_CATEGORY, type ResultEntry, type ResultSet } from '../types.js'
import { deriveMetric, type DeriveOptions } from '../derived/engine.js'
import { configValue } from '../results/axes.js'
import { groupBy, groupByApplication, sortCategories } from '../results/result-set.js'

export interface CapacityScore {
  readonly capacity: string
  /** Mean IPC over the runs at this capacity with IPC above zero. */
  readonly ipc: number
}

export interface ApplicationSummary {
  readonly application: string
  readonly runs: number
  /** Absent when fewer than two runs exist. */
  readonly ipcRange?: { readonly min: number; readonly max: number }
  /** (max - min) / min as a percentage; absent when min IPC is not positive. */
  readonly improvementPercent?: number
  /** Sorted; empty unless at least two distinct capacities were swept. */
  readonly capacities: readonly string[]
  readonly best?: CapacityScore
  readonly worst?: CapacityScore
}

export interface SweepSummary {
  readonly applications: readonly ApplicationSummary[]
}

const MIN_RUNS = 2

function capacityOf(entry: ResultEntry): string {
  const value = configValue(entry, 'l1d_size')
  return value === undefined ? UNKNOWN_CATEGORY : String(value)
}

function scoreCapacities(
  entries: readonly ResultEntry[],
  ipcOf: (entry: ResultEntry) => number
): CapacityScore[] {
  const scores: CapacityScore[] = []
  const byCapacity = groupBy(entries, capacityOf)
  for (const capacity of sortCategories(byCapacity.keys())) {
    const ipcs = (byCapacity.get(capacity) ?? []).map(ipcOf).filter((ipc) => ipc > 0)
    if (ipcs.length === 0) continue
    scores.push({ capacity, ipc: ipcs.reduce((sum, ipc) => sum + ipc, 0) / ipcs.length })
  }
  return scores
}

function summarizeApplication(
  application: string,
  entries: readonly ResultEntry[],
  options: DeriveOptions
): ApplicationSummary {
  if (entries.length < MIN_RUNS) {
    return { application, runs: entries.length, capacities: [] }
  }

  const ipcOf = (entry: ResultEntry): number => deriveMetric('ipc', entry.metrics, options).value
  const ipcs = entries.map(ipcOf)
  const min = Math.min(...ipcs)
  const max = Math.max(...ipcs)

  const distinct = sortCategories(new Set(entries.map(capacityOf)))
  const scores = distinct.length > 1 ? scoreCapacities(entries, ipcOf) : []
  // Ties go to the smaller capacity.
  const best = scores.reduce<CapacityScore | undefined>((acc, s) => (acc === undefined || s.ipc > acc.ipc ? s : acc), undefined)
  const worst = scores.reduce<CapacityScore | undefined>((acc, s) => (acc === undefined || s.ipc < acc.ipc ? s : acc), undefined)

  return {
    application,
    runs: entries.length,
    ipcRange: { min, max },
    ...(min > 0 ? { improvementPercent: ((max - min) / min) * 100 } : {}),
    capacities: distinct.length > 1 ? distinct : [],
    ...(best !== undefined ? { best } : {}),
    ...(worst !== undefined ? { worst } : {}),
  }
}

/** Summarises every application in the set, applications in sorted order. */
export function summarizeSweep(resultSet: ResultSet, options: DeriveOptions = {}): SweepSummary {
  const groups = groupByApplication(resultSet.entries)
  return {
    applications: sortCategories(groups.keys()).map((application) =>
      summarizeApplication(application, groups.get(application) ?? [], options)
    ),
  }
}

export function renderSweepSummary(summary: SweepSummary): string {
  const rule = '='.repeat(70)
  const lines: string[] = [rule, 'ANALYSIS SUMMARY', rule]

  for (const app of summary.applications) {
    lines.push('', `${app.application.toUpperCase()}:`)
    if (app.ipcRange === undefined) {
      lines.push('  Not enough data points for analysis')
      continue
    }
    lines.push(`  IPC range: ${app.ipcRange.min.toFixed(4)} to ${app.ipcRange.max.toFixed(4)}`)
    if (app.improvementPercent !== undefined) {
      lines.push(`  Max improvement: ${app.improvementPercent.toFixed(1)}%`)
    }
    if (app.capacities.length > 0) {
      lines.push(`  Capacities tested: ${app.capacities.join(', ')}`)
    }
    if (app.best !== undefined) {
      lines.push(`  Best capacity: ${app.best.capacity} (IPC: ${app.best.ipc.toFixed(4)})`)
    }
    if (app.worst !== undefined) {
      lines.push(`  Worst capacity: ${app.worst.capacity} (IPC: ${app.worst.ipc.toFixed(4)})`)
    }
  }
  return lines.join('\n')
}
