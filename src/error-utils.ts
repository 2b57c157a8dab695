import type { z } from 'zod'

/**
 * Formats a Zod issue path as a dot/bracket string.
 *
 * Examples:
 *   []                                  → "(root)"
 *   ["extraction", "conflictPolicy"]    → "extraction.conflictPolicy"
 *   ["logFiles", "patterns", 1]         → "logFiles.patterns[1]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/**
 * Formats Zod issues into a multi-line string, one indented line per issue
 * holding the field path and message.
 */
export function formatZodErrors(errors: readonly z.ZodIssue[]): string {
  return errors
    .map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`)
    .join('\n')
}

/** Message of an unknown thrown value, for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
