/**
 * Structured metric types emitted by sweepstat pipeline stages.
 * All types are immutable and serializable to JSON.
 */

/** Emitted once a results tree has been collected. */
export interface CollectMetrics {
  readonly stage: 'collect'
  readonly root: string
  readonly rootFound: boolean
  readonly logFilesFound: number
  readonly entriesCollected: number
  readonly unreadableLogs: number
  readonly emptyLogs: number
  readonly malformedLines: number
  readonly conflicts: number
}

/** Emitted once a report has been produced. */
export interface ReportMetrics {
  readonly stage: 'report'
  readonly xAxis: string
  readonly yAxis: string
  /** `table-fallback` when a plot was requested but the table was printed instead. */
  readonly mode: 'table' | 'plot' | 'table-fallback'
  readonly sections: number
  readonly categories: number
  readonly estimatedValues: number
}

/** Union of all metric payload types. */
export type MetricData = CollectMetrics | ReportMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}

/** Wraps a payload in a {@link MetricEvent} stamped with the current time. */
export function createMetricEvent(data: MetricData): MetricEvent {
  return { stage: data.stage, timestamp: new Date().toISOString(), data }
}
