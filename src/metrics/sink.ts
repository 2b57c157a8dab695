/**
 * Metric emission sinks: structured stderr output and an optional JSONL file.
 *
 * `emitMetric` writes to console.warn with a `[sweepstat:metrics]` prefix.
 * `appendMetricsFile` appends to `{outputDir}/.metrics.jsonl`.
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import type { MetricEvent } from './types.js'

export const METRICS_FILE_NAME = '.metrics.jsonl'

/**
 * Emits a metric event to stderr via console.warn. Callers decide whether
 * to call this (config `metrics.emit`).
 */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[sweepstat:metrics] ${JSON.stringify(event)}`)
}

/**
 * Appends a metric event as one JSONL line to `{outputDir}/.metrics.jsonl`,
 * creating the directory when needed.
 *
 * Never throws: a failed append is logged, the report it describes has
 * already been produced.
 */
export async function appendMetricsFile(outputDir: string, event: MetricEvent): Promise<void> {
  const filePath = join(outputDir, METRICS_FILE_NAME)
  try {
    await fs.mkdir(outputDir, { recursive: true })
    await fs.appendFile(filePath, JSON.stringify(event) + '\n', 'utf-8')
  } catch (err) {
    console.error(
      `[sweepstat] metrics: failed to append to ${filePath}:`,
      err instanceof Error ? err.message : String(err),
    )
  }
}

export interface MetricsSettings {
  readonly emit: boolean
  readonly fileSink: boolean
}

/** Sends an event to every sink enabled in `settings`. */
export async function recordMetric(
  settings: MetricsSettings,
  outputDir: string,
  event: MetricEvent
): Promise<void> {
  if (settings.emit) emitMetric(event)
  if (settings.fileSink) await appendMetricsFile(outputDir, event)
}
