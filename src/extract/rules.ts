/**
 * The ordered table of naming-convention rules.
 *
 * Each rule is a pattern plus a function turning its match into a config
 * fragment. Rules are independent of one another: recognising a new token is
 * a new table entry, never a change to the extractor.
 */

import type { ApplicationMatch } from '../config.js'
import type { ConfigRecord, MutableConfigRecord } from '../types.js'
import { canonicalCapacity, toGigahertz } from '../units/normalize.js'

export interface ExtractionRule {
  /** Stable identifier, reported in conflicts. */
  readonly id: string
  /** Matched against one name segment. Must not carry the `g` or `y` flag. */
  readonly pattern: RegExp
  readonly apply: (match: RegExpExecArray) => ConfigRecord
}

export interface RuleTableOptions {
  /** Application names recognised inside directory names. */
  readonly applications?: readonly string[]
  /** Default "name": the application alone, not the segment around it. */
  readonly applicationMatch?: ApplicationMatch
  /** Capacity substituted for a cache level encoded as "None". */
  readonly noCacheCapacity?: string
}

const DEFAULT_NO_CACHE_CAPACITY = '256kB'

/** A capacity with a mandatory unit: 32kB, 1MB, 2M, 512B, 64KiB. */
const CAPACITY = '\\d+(?:\\.\\d+)?(?:[kKmMgGtT]i?[bB]?|[bB])'

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function cacheLevelRule(
  id: string,
  prefix: string,
  sizeKey: 'l1i_size' | 'l1d_size' | 'l2_size' | 'l3_size',
  assocKey: 'l1i_assoc' | 'l1d_assoc' | 'l2_assoc' | 'l3_assoc',
  noCacheCapacity: string
): ExtractionRule {
  return {
    id,
    pattern: new RegExp(`(?:^|_)${prefix}(${CAPACITY}|None)(?:A(\\d+))?(?=_|$)`),
    apply: (match) => {
      const [, size, assoc] = match
      if (size === undefined) return {}
      const fragment: MutableConfigRecord = {}
      fragment[sizeKey] = size === 'None' ? canonicalCapacity(noCacheCapacity) : canonicalCapacity(size)
      if (assoc !== undefined) fragment[assocKey] = Number.parseInt(assoc, 10)
      return fragment
    },
  }
}

/**
 * Builds the default rule table. Table order is the precedence order under
 * the "first-match" conflict policy.
 */
export function buildExtractionRules(options: RuleTableOptions = {}): readonly ExtractionRule[] {
  const noCacheCapacity = options.noCacheCapacity ?? DEFAULT_NO_CACHE_CAPACITY
  const applications = options.applications ?? []
  const applicationMatch = options.applicationMatch ?? 'name'

  const rules: ExtractionRule[] = [
    {
      // stats_<kernel>_<opt|unopt>_...
      id: 'kernel-variant',
      pattern: /^stats_(.+?)_(opt|unopt)(?=_|$)/,
      apply: ([, kernel, variant]) =>
        kernel === undefined ? {} : { application: kernel, optimized: variant === 'opt' },
    },
    {
      // stats_binary<label>_CPU...
      id: 'binary-label',
      pattern: /^stats_binary(.+?)(?=_CPU|_L1|_L2|_L3|$)/,
      apply: ([, label]) => (label === undefined ? {} : { application: label }),
    },
  ]

  if (applications.length > 0) {
    // Longest names first: "matrix_mult" before "mult".
    const alternatives = [...applications].sort((a, b) => b.length - a.length).map(escapeRegExp)
    rules.push({
      id: 'known-application',
      pattern: new RegExp(`^(?!stats[_.]).*?(${alternatives.join('|')})`),
      apply: (match) => {
        if (applicationMatch === 'segment') return { application: match.input }
        const [, name] = match
        return name === undefined ? {} : { application: name }
      },
    })
  }

  rules.push(
    {
      id: 'opt-flag',
      pattern: /(?:^|[_.-])(opt|unopt|optimized|unoptimized)(?=$|[_.-])/i,
      apply: ([, flag]) =>
        flag === undefined ? {} : { optimized: flag.toLowerCase().startsWith('opt') },
    },
    cacheLevelRule('l1i-cache', 'L1I', 'l1i_size', 'l1i_assoc', noCacheCapacity),
    cacheLevelRule('l1d-cache', 'L1D', 'l1d_size', 'l1d_assoc', noCacheCapacity),
    cacheLevelRule('l2-cache', 'L2', 'l2_size', 'l2_assoc', noCacheCapacity),
    cacheLevelRule('l3-cache', 'L3', 'l3_size', 'l3_assoc', noCacheCapacity),
    {
      id: 'capacity',
      pattern: /(?:^|[_-])(\d+[kKmMgG][bB])(?=$|[_-])/,
      apply: ([, size]) => (size === undefined ? {} : { cache_size: canonicalCapacity(size) }),
    },
    {
      id: 'associativity',
      pattern: /(?:^|[_-])(?:assoc(\d+)|(\d+)-?way)(?=$|[_-])/i,
      apply: ([, assoc, ways]) => {
        const digits = assoc ?? ways
        return digits === undefined ? {} : { associativity: Number.parseInt(digits, 10) }
      },
    },
    {
      id: 'cpu-model',
      pattern: /(?:^|_)(?:CPU)?(Timing|Atomic|O3|Minor)(?:Simple)?(?:CPU)?(?=_|$)/,
      apply: ([, family]) => (family === undefined ? {} : { cpu_type: `${family}CPU` }),
    },
    {
      id: 'clock',
      pattern: /(?:^|_)(\d+(?:\.\d+)?[GM])(?:Hz)?(?=_|$)/,
      apply: ([, frequency]) =>
        frequency === undefined ? {} : { clock_ghz: toGigahertz(frequency) },
    },
    {
      id: 'memory',
      pattern:
        /(?:^|_)(DDR[345]_\d+_\d+x\d+|LPDDR\d+_\d+(?:_\d+x\d+)?|HBM_\d+_\d+H_\d+x\d+|GDDR5_\d+_\d+x\d+)(?=_|$)/,
      apply: ([, memory]) => (memory === undefined ? {} : { mem_type: memory }),
    },
    {
      id: 'branch-predictor',
      pattern: /(?:^|_)(Local|Tournament|BiMode|LTAGE|TAGE|Multiperspective)BP(?=_|$)/,
      apply: ([, family]) => (family === undefined ? {} : { branch_predictor: `${family}BP` }),
    },
  )

  return rules
}
