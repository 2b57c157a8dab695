/**
 * Builds a ResultSet from a results tree on disk.
 *
 * Every file whose bare name matches a configured log-file pattern is one
 * run: per-run directories holding a fixed-name `stats.txt` and flat
 * directories of `stats_<config>.txt` files both work. Files are read one at
 * a time in sorted path order, so discovery order is deterministic.
 */

import fs, { type Dirent } from 'node:fs'
import path from 'node:path'
import { defaultConfig, type SweepstatConfig } from '../config.js'
import { extractConfigFromPath } from '../extract/extractor.js'
import { buildExtractionRules } from '../extract/rules.js'
import { readMetricLog, type ParsedMetricLog } from '../parser/metric-log.js'
import { createResultEntry, type ResultEntry, type ResultSet } from '../types.js'
import { isDirectory } from '../utils/fs.js'
import { describeError } from '../error-utils.js'

function warnSkipped(what: string, err: unknown): void {
  console.warn(`[sweepstat] collect: cannot read ${what}: ${describeError(err)}, skipped`)
}

/**
 * True when `entry` is a regular file, or a symlink that resolves to one.
 * Symlinked directories are not followed; a dangling link is warned about.
 */
async function isLogFileCandidate(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) return true
  if (!entry.isSymbolicLink()) return false
  try {
    return (await fs.promises.stat(fullPath)).isFile()
  } catch (err) {
    warnSkipped(fullPath, err)
    return false
  }
}

/**
 * Recursively lists files under `dir` whose name matches one of `patterns`,
 * as paths relative to `root` with forward slashes, sorted. A directory that
 * cannot be listed is warned about and skipped.
 */
export async function findLogFiles(
  dir: string,
  patterns: readonly RegExp[],
  root: string = dir
): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true })
  } catch (err) {
    warnSkipped(`directory ${dir}`, err)
    return []
  }
  const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name))

  const results: string[] = []
  for (const entry of sorted) {
    const fullPath = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      results.push(...(await findLogFiles(fullPath, patterns, root)))
    } else if (patterns.some((pattern) => pattern.test(entry.name)) && (await isLogFileCandidate(entry, fullPath))) {
      results.push(path.relative(root, fullPath).split(path.sep).join('/'))
    }
  }
  return results
}

/**
 * Collects every metric log under `rootDir` into a ResultSet.
 *
 * A missing root is a warning and yields an empty set with
 * `diagnostics.rootFound === false`. Logs that cannot be read or hold no
 * metric are skipped with a warning and counted. Naming conflicts are logged
 * and counted.
 */
export async function collect(rootDir: string, config: SweepstatConfig = defaultConfig()): Promise<ResultSet> {
  if (!(await isDirectory(rootDir))) {
    console.warn(`[sweepstat] collect: results directory not found: ${rootDir}`)
    return {
      root: rootDir,
      entries: [],
      diagnostics: {
        rootFound: false,
        logFilesFound: 0,
        unreadableLogs: 0,
        emptyLogs: 0,
        malformedLines: 0,
        conflicts: 0,
      },
    }
  }

  const patterns = config.logFiles.patterns.map((source) => new RegExp(source))
  const rules = buildExtractionRules({
    applications: config.extraction.applications,
    applicationMatch: config.extraction.applicationMatch,
    noCacheCapacity: config.extraction.noCacheCapacity,
  })
  const logFiles = await findLogFiles(rootDir, patterns)

  const entries: ResultEntry[] = []
  let unreadableLogs = 0
  let emptyLogs = 0
  let malformedLines = 0
  let conflicts = 0

  for (const relativePath of logFiles) {
    let parsed: ParsedMetricLog
    try {
      parsed = await readMetricLog(path.join(rootDir, relativePath), {
        commentPrefixes: config.parser.commentPrefixes,
      })
    } catch (err) {
      unreadableLogs++
      warnSkipped(relativePath, err)
      continue
    }
    malformedLines += parsed.malformedLines

    if (Object.keys(parsed.metrics).length === 0) {
      emptyLogs++
      console.warn(`[sweepstat] collect: no metrics in ${relativePath}, skipped`)
      continue
    }

    const extraction = extractConfigFromPath(relativePath, {
      rules,
      conflictPolicy: config.extraction.conflictPolicy,
    })
    for (const conflict of extraction.conflicts) {
      console.warn(
        `[sweepstat] collect: ${relativePath}: ${conflict.key} is ambiguous: ` +
        `kept ${String(conflict.kept)} (${conflict.keptBy}), ` +
        `ignored ${String(conflict.discarded)} (${conflict.discardedBy})`
      )
    }
    conflicts += extraction.conflicts.length

    entries.push(createResultEntry(relativePath, parsed.metrics, extraction.config))
  }

  return {
    root: rootDir,
    entries,
    diagnostics: {
      rootFound: true,
      logFilesFound: logFiles.length,
      unreadableLogs,
      emptyLogs,
      malformedLines,
      conflicts,
    },
  }
}
