/**
 * errors — Failure kinds that abort a computation.
 *
 * Conditions that are part of the answer are NOT errors and never throw:
 *   - no sunrise in the window      → SunriseResult { found: false }
 *   - observed altitude unreachable → empty candidate list
 *
 * Everything here propagates to the caller, which abandons the whole pass.
 */

/** Base class for all errors raised by this library */
export class GhatikaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A search window whose start is not strictly before its end */
export class InvalidWindowError extends GhatikaError {
  readonly start: Date
  readonly end: Date

  constructor(start: Date, end: Date) {
    super(`Invalid time window: start ${fmtInstant(start)} is not before end ${fmtInstant(end)}`)
    this.start = start
    this.end = end
  }
}

/** Malformed caller input: out-of-range coordinates, bad options, unknown star */
export class InvalidInputError extends GhatikaError {}

/**
 * The coordinate transform provider failed for a sampled instant.
 * Solvers never skip the sample, since a gap could hide a real crossing.
 */
export class ProviderFailureError extends GhatikaError {
  readonly instant: Date

  constructor(instant: Date, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Coordinate provider failed at ${fmtInstant(instant)}: ${reason}`, { cause })
    this.instant = instant
  }
}

function fmtInstant(d: Date): string {
  return Number.isNaN(d.getTime()) ? 'Invalid Date' : d.toISOString()
}
