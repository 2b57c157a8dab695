/**
 * Typed errors for caller-facing contract violations.
 *
 * Parsing and extraction problems never surface here: they are recovered per
 * file or per line and reported as counts. Only a report request that cannot
 * be satisfied is escalated.
 */

export type AxisRole = 'x' | 'y'

/** A requested axis/metric name is not among the parameters the results provide. */
export class UnknownParameterError extends Error {
  readonly parameter: string
  readonly axis: AxisRole
  /** Every name that would have been accepted, sorted. */
  readonly validParameters: readonly string[]

  constructor(parameter: string, axis: AxisRole, validParameters: readonly string[]) {
    super(
      `Unrecognized parameter "${parameter}" for the ${axis}-axis. ` +
      `Valid parameters: ${validParameters.join(', ')}`
    )
    this.name = 'UnknownParameterError'
    this.parameter = parameter
    this.axis = axis
    this.validParameters = validParameters
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export type EmptyResultReason = 'missing-root' | 'no-logs'

/** A report was requested but the results tree produced no entries. */
export class EmptyResultSetError extends Error {
  readonly root: string
  readonly reason: EmptyResultReason

  constructor(root: string, reason: EmptyResultReason) {
    super(
      reason === 'missing-root'
        ? `Results directory not found: ${root}`
        : `No parseable metric logs found under ${root}`
    )
    this.name = 'EmptyResultSetError'
    this.root = root
    this.reason = reason
    Object.setPrototypeOf(this, new.target.prototype)
  }
}
