import path from 'node:path'
import {
  CONFIG_KEYS,
  type ConfigKey,
  type ConfigRecord,
  type ConfigValueMap,
  type ExtractionConflict,
  type MutableConfigRecord,
} from '../types.js'
import type { ConflictPolicy } from '../config.js'
import { buildExtractionRules, type ExtractionRule, type RuleTableOptions } from './rules.js'

export interface ExtractOptions extends RuleTableOptions {
  /** Rule table to apply. Defaults to {@link buildExtractionRules} with these options. */
  readonly rules?: readonly ExtractionRule[]
  /** Which value survives when two sources disagree. Default "first-match". */
  readonly conflictPolicy?: ConflictPolicy
}

export interface ExtractionResult {
  readonly config: ConfigRecord
  /** Ids of the rules that matched, in the order they were tried. */
  readonly matchedRules: readonly string[]
  readonly conflicts: readonly ExtractionConflict[]
}

interface Candidate {
  readonly value: ConfigValueMap[ConfigKey]
  readonly source: string
}

function setField<K extends ConfigKey>(
  record: MutableConfigRecord,
  key: K,
  value: ConfigValueMap[K]
): void {
  record[key] = value
}

/**
 * Folds one fragment into the candidate map, recording a conflict whenever a
 * key already holds a different value.
 */
function mergeFragment(
  candidates: Map<ConfigKey, Candidate>,
  fragment: ConfigRecord,
  source: string,
  policy: ConflictPolicy,
  conflicts: ExtractionConflict[]
): void {
  for (const key of CONFIG_KEYS) {
    const value = fragment[key]
    if (value === undefined) continue

    const existing = candidates.get(key)
    if (existing === undefined) {
      candidates.set(key, { value, source })
      continue
    }
    if (existing.value === value) continue

    if (policy === 'first-match') {
      conflicts.push({ key, kept: existing.value, discarded: value, keptBy: existing.source, discardedBy: source })
    } else {
      conflicts.push({ key, kept: value, discarded: existing.value, keptBy: source, discardedBy: existing.source })
      candidates.set(key, { value, source })
    }
  }
}

function toRecord(candidates: ReadonlyMap<ConfigKey, Candidate>): ConfigRecord {
  const record: MutableConfigRecord = {}
  for (const key of CONFIG_KEYS) {
    const candidate = candidates.get(key)
    if (candidate !== undefined) setField(record, key, candidate.value)
  }
  return record
}

function resolveRules(options: ExtractOptions): readonly ExtractionRule[] {
  return options.rules ?? buildExtractionRules(options)
}

function applyRules(
  name: string,
  rules: readonly ExtractionRule[],
  policy: ConflictPolicy,
  candidates: Map<ConfigKey, Candidate>,
  conflicts: ExtractionConflict[],
  matchedRules: string[],
  sourceSuffix: string
): void {
  for (const rule of rules) {
    const match = rule.pattern.exec(name)
    if (match === null) continue
    matchedRules.push(rule.id)
    mergeFragment(candidates, rule.apply(match), `${rule.id}${sourceSuffix}`, policy, conflicts)
  }
}

/**
 * Recovers configuration from a single file or directory name. Every rule is
 * tried; a name may match none, one or several. Unmatched keys are absent.
 */
export function extractConfig(name: string, options: ExtractOptions = {}): ExtractionResult {
  const policy = options.conflictPolicy ?? 'first-match'
  const candidates = new Map<ConfigKey, Candidate>()
  const conflicts: ExtractionConflict[] = []
  const matchedRules: string[] = []

  applyRules(name, resolveRules(options), policy, candidates, conflicts, matchedRules, '')

  return { config: toRecord(candidates), matchedRules, conflicts }
}

/**
 * Splits a relative log path into the name segments examined for
 * configuration: the file name without its extension, then each parent
 * directory from the innermost outwards.
 */
export function pathSegments(relativePath: string): readonly string[] {
  const parts = relativePath.split(/[\\/]+/).filter((part) => part.length > 0 && part !== '.')
  const fileName = parts.pop()
  if (fileName === undefined) return []
  const stem = path.parse(fileName).name
  return [stem, ...parts.reverse()]
}

/**
 * Recovers configuration from a log path relative to the results root. Each
 * segment is examined with the full rule table; under "first-match" the
 * innermost segment wins a disagreement.
 */
export function extractConfigFromPath(relativePath: string, options: ExtractOptions = {}): ExtractionResult {
  const policy = options.conflictPolicy ?? 'first-match'
  const rules = resolveRules(options)
  const candidates = new Map<ConfigKey, Candidate>()
  const conflicts: ExtractionConflict[] = []
  const matchedRules: string[] = []

  for (const segment of pathSegments(relativePath)) {
    applyRules(segment, rules, policy, candidates, conflicts, matchedRules, `@${segment}`)
  }

  return { config: toRecord(candidates), matchedRules, conflicts }
}
