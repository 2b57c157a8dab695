/**
 * Metric log parser.
 *
 * A metric log holds one statistic per line:
 *
 *   <key> <value> [# annotation]
 *
 * Keys are matched by exact string. Values that read as floats become numbers,
 * everything else is kept verbatim. Nothing in a log is fatal: blank lines and
 * comments are skipped, single-token lines are counted and skipped.
 */

import type { MetricRecord, MetricValue } from '../types.js'
import { readFileOrNull } from '../utils/fs.js'

export interface MetricLogOptions {
  /** Lines starting with any of these (after trimming) are ignored. */
  readonly commentPrefixes?: readonly string[]
}

export interface ParsedMetricLog {
  readonly metrics: MetricRecord
  /** Non-blank, non-comment lines with fewer than two tokens. */
  readonly malformedLines: number
}

const DEFAULT_COMMENT_PREFIXES: readonly string[] = ['#']

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i
const INFINITY_RE = /^([+-]?)inf(?:inity)?$/i
const NAN_RE = /^[+-]?nan$/i

/**
 * Float parse of a single token, or null when the token is not a float.
 * Accepts decimal and exponent notation plus inf/infinity/nan, which the
 * simulator writes for undefined ratios.
 */
export function parseNumericToken(token: string): number | null {
  if (DECIMAL_RE.test(token)) return Number(token)
  const inf = INFINITY_RE.exec(token)
  if (inf !== null) return inf[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  if (NAN_RE.test(token)) return Number.NaN
  return null
}

function toMetricValue(token: string): MetricValue {
  return parseNumericToken(token) ?? token
}

/**
 * Parses metric log text. Pure; the last occurrence of a duplicated key wins.
 */
export function parseMetricLog(content: string, options: MetricLogOptions = {}): ParsedMetricLog {
  const commentPrefixes = options.commentPrefixes ?? DEFAULT_COMMENT_PREFIXES
  const metrics: Record<string, MetricValue> = {}
  let malformedLines = 0

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (line.length === 0) continue
    if (commentPrefixes.some((prefix) => line.startsWith(prefix))) continue

    const [key, value] = line.split(/\s+/)
    if (key === undefined || value === undefined) {
      malformedLines++
      continue
    }
    // defineProperty keeps a logged "__proto__" as an ordinary key.
    Object.defineProperty(metrics, key, {
      value: toMetricValue(value),
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }

  return { metrics, malformedLines }
}

/**
 * Reads and parses one metric log. A missing file yields an empty record and
 * a warning; other read errors propagate.
 */
export async function readMetricLog(
  filePath: string,
  options: MetricLogOptions = {}
): Promise<ParsedMetricLog> {
  const content = await readFileOrNull(filePath)
  if (content === null) {
    console.warn(`[sweepstat] metric-log: file not found: ${filePath}`)
    return { metrics: {}, malformedLines: 0 }
  }
  return parseMetricLog(content, options)
}
