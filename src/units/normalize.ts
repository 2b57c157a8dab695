/**
 * Unit normalisation for capacities and clock frequencies.
 *
 * Both conversions are total: anything they cannot read becomes 0. Numeric
 * input is taken to be canonical already and passes through unchanged, so
 * normalising a normalised value is a no-op.
 */

const KIB_PER_UNIT: Readonly<Record<string, number>> = {
  K: 1,
  M: 1024,
  G: 1024 * 1024,
  T: 1024 * 1024 * 1024,
}

/** `<number>[K|M|G|T][i][B]`, case-insensitive. */
const CAPACITY_RE = /^\s*(\d+(?:\.\d+)?)\s*(?:([kmgt])i?)?(b)?\s*$/i

/** Same shape as CAPACITY_RE but a unit letter is required. */
const CAPACITY_WITH_UNIT_RE = /^\s*\d+(?:\.\d+)?\s*(?:[kmgt]i?b?|b)\s*$/i

const FREQUENCY_RE = /^\s*(\d+(?:\.\d+)?)\s*([gm])?(?:hz)?\s*$/i

/**
 * Converts a capacity to kibibytes.
 *
 * "128kB" → 128, "2MB" → 2048, "1GB" → 1048576, "512B" → 0.5, "4096" → 4.
 * A string without a K/M/G/T unit is a byte count.
 */
export function toKibibytes(value: number | string): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0

  const match = CAPACITY_RE.exec(value)
  if (match === null) return 0
  const [, digits, unit] = match
  if (digits === undefined) return 0

  const magnitude = Number.parseFloat(digits)
  if (unit === undefined) return magnitude / 1024
  return magnitude * (KIB_PER_UNIT[unit.toUpperCase()] ?? 0)
}

/**
 * Converts a clock frequency to gigahertz.
 *
 * "2GHz" → 2, "500MHz" → 0.5, "3G" → 3. Unit-less strings are read as GHz.
 */
export function toGigahertz(value: number | string): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0

  const match = FREQUENCY_RE.exec(value)
  if (match === null) return 0
  const [, digits, unit] = match
  if (digits === undefined) return 0

  const magnitude = Number.parseFloat(digits)
  return unit !== undefined && unit.toUpperCase() === 'M' ? magnitude / 1000 : magnitude
}

/** True for strings such as "32kB", "2MB" or "512B" (a unit is required). */
export function isCapacityString(value: string): boolean {
  return CAPACITY_WITH_UNIT_RE.test(value)
}

/**
 * Formats kibibytes with the largest unit that divides it exactly:
 * 32 → "32kB", 2048 → "2MB", 0.5 → "512B".
 */
export function formatCapacity(kib: number): string {
  if (kib < 1) return `${kib * 1024}B`
  const units = [
    ['TB', KIB_PER_UNIT['T'] ?? 0],
    ['GB', KIB_PER_UNIT['G'] ?? 0],
    ['MB', KIB_PER_UNIT['M'] ?? 0],
  ] as const
  for (const [suffix, scale] of units) {
    if (kib >= scale && kib % scale === 0) return `${kib / scale}${suffix}`
  }
  return `${kib}kB`
}

/**
 * Rewrites a capacity token in canonical form ("32KB" → "32kB", "1M" → "1MB").
 * Tokens that do not read as a capacity are returned unchanged.
 */
export function canonicalCapacity(token: string): string {
  const kib = toKibibytes(token)
  return kib > 0 ? formatCapacity(kib) : token
}
