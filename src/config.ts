import { z } from 'zod'
import { parse as yamlParse } from 'yaml'
import { formatZodErrors } from './error-utils.js'
import { readFileOrNull } from './utils/fs.js'
import { isCapacityString } from './units/normalize.js'

// ---------------------------------------------------------------------------
// Field validators
// ---------------------------------------------------------------------------

/** A regular-expression source string that compiles. */
const regexSourceField = z.string().min(1).refine(
  (v) => {
    try {
      new RegExp(v)
      return true
    } catch {
      return false
    }
  },
  { message: 'Pattern must be a valid regular expression' }
)

/** A capacity with an explicit unit, e.g. "256kB" or "1MB". */
const capacityField = z.string().refine(isCapacityString, {
  message: 'Capacity must be a number followed by a unit (e.g. "256kB", "1MB")',
})

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/** Which files under the results root are metric logs. */
const logFilesSchema = z
  .object({
    /**
     * Regular expressions matched against the bare file name. A file matching
     * any of them is parsed as one run.
     */
    patterns: z
      .array(regexSourceField)
      .min(1, 'logFiles.patterns must list at least one pattern')
      .default(['^stats\\.txt$', '^stats_.+\\.txt$']),
  })
  .strip()

const parserSchema = z
  .object({
    /** Lines starting with any of these prefixes are comments. */
    commentPrefixes: z.array(z.string().min(1)).default(['#']),
  })
  .strip()

const extractionSchema = z
  .object({
    /**
     * Application/kernel names recognised inside directory names.
     */
    applications: z
      .array(z.string().min(1))
      .default(['matrix_mult', 'image_blur', 'hash_ops', 'stream_bench']),
    /**
     * What a segment containing a known application yields: "name" keeps just
     * the matched application ("matrix_mult_16kB" → "matrix_mult"), "segment"
     * keeps the whole segment.
     */
    applicationMatch: z.enum(['name', 'segment']).default('name'),
    /**
     * Capacity substituted when a cache level is encoded as "None", so that
     * every run still has a comparable size for that level.
     */
    noCacheCapacity: capacityField.default('256kB'),
    /**
     * Resolution when two rules (or two path segments) supply different values
     * for the same key. "first-match" keeps the earlier rule in table order and
     * the innermost path segment; "last-match" keeps the later one.
     */
    conflictPolicy: z.enum(['first-match', 'last-match']).default('first-match'),
  })
  .strip()

const derivedSchema = z
  .object({
    /**
     * Clock rate assumed when execution time has to be estimated from the tick
     * count. The estimate is only exact for runs at this clock.
     */
    nominalClockGhz: z.number().positive('nominalClockGhz must be positive').default(2),
  })
  .strip()

const reportSchema = z
  .object({
    /** How runs are split into table sections / plot series. */
    splitBy: z.enum(['application', 'optimized', 'none']).default('application'),
    /** Width of the label and statistic columns. */
    columnWidth: z.number().int().min(6).max(40).default(12),
    /** Decimal places for statistic columns. */
    precision: z.number().int().min(0).max(10).default(4),
  })
  .strip()

const metricsSchema = z
  .object({
    /** Emit pipeline metric events to stderr. */
    emit: z.boolean().default(false),
    /** Append metric events to `.metrics.jsonl` in the output directory. */
    fileSink: z.boolean().default(false),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the full sweepstat configuration.
 *
 * Unknown keys are stripped, not rejected. Every field has a default; an
 * empty object produces a complete configuration.
 */
export const sweepstatConfigSchema = z
  .object({
    logFiles: logFilesSchema.default({}),
    parser: parserSchema.default({}),
    extraction: extractionSchema.default({}),
    derived: derivedSchema.default({}),
    report: reportSchema.default({}),
    metrics: metricsSchema.default({}),
  })
  .strip()

const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  logFiles: new Set(Object.keys(logFilesSchema.shape)),
  parser: new Set(Object.keys(parserSchema.shape)),
  extraction: new Set(Object.keys(extractionSchema.shape)),
  derived: new Set(Object.keys(derivedSchema.shape)),
  report: new Set(Object.keys(reportSchema.shape)),
  metrics: new Set(Object.keys(metricsSchema.shape)),
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Unknown key paths at the top level and one level deep (e.g. `"report.typo"`). */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(sweepstatConfigSchema.shape))
  const result: string[] = []
  for (const [key, nested] of Object.entries(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved configuration with all defaults applied. Immutable. */
export type SweepstatConfig = DeepReadonly<z.infer<typeof sweepstatConfigSchema>>

export type ConflictPolicy = SweepstatConfig['extraction']['conflictPolicy']
export type ApplicationMatch = SweepstatConfig['extraction']['applicationMatch']
export type SplitBy = SweepstatConfig['report']['splitBy']

export interface ParseConfigOptions {
  /**
   * Called with unknown key paths (e.g. `["unknownTop", "report.typo"]`).
   * @example
   *   parseConfig(raw, {
   *     onUnknownKeys: (keys) => console.warn(`Unknown keys: ${keys.join(', ')}`)
   *   })
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values. The message
 * lists every failing field with its path.
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(`sweepstat configuration is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw config input, applying all defaults.
 * `null`/`undefined` input yields the default configuration.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): SweepstatConfig {
  const input = raw ?? {}
  const result = sweepstatConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(input) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(input)
    if (unknownKeys.length > 0) options.onUnknownKeys(unknownKeys)
  }

  return result.data
}

/** The configuration used when no config file is given. */
export function defaultConfig(): SweepstatConfig {
  return parseConfig({})
}

/**
 * Loads a YAML configuration file. A missing file yields the defaults with a
 * warning; unknown keys are reported with a warning.
 *
 * @throws {ConfigValidationError} if the file's content is invalid.
 * @throws {Error} if the file is not valid YAML.
 */
export async function loadConfigFile(filePath: string): Promise<SweepstatConfig> {
  const text = await readFileOrNull(filePath)
  if (text === null) {
    console.warn(`[sweepstat] config: ${filePath} not found, using defaults`)
    return defaultConfig()
  }

  const raw: unknown = yamlParse(text)
  return parseConfig(raw, {
    onUnknownKeys: (keys) =>
      console.warn(`[sweepstat] config: ignoring unknown keys in ${filePath}: ${keys.join(', ')}`),
  })
}
