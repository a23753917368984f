/**
 * config — Option objects, their defaults, and input validation.
 *
 * Every public computation takes a partial options object. It is resolved here
 * into a complete `SolverOptions` (zod fills the defaults and rejects
 * out-of-range values) plus the coordinate provider to use.
 */

import { z } from 'zod'
import type { ObserverLocation } from '../types.js'
import { SUN_ALTITUDE_THRESHOLD } from '../types.js'
import type { CoordinateProvider } from '../provider/index.js'
import { astronomyEngineProvider } from '../provider/index.js'
import { InvalidInputError } from '../errors/index.js'

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const ObserverLocationSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  altitude: z.number().finite().min(0).default(0),
  timezoneOffset: z.number().finite().min(-14).max(14),
  name: z.string().min(1).optional(),
})

export type ObserverLocationInput = z.input<typeof ObserverLocationSchema>

export const SolverOptionsSchema = z.object({
  /** Coarse sampling step used to bracket crossings and maxima, minutes */
  stepMinutes: z.number().finite().positive().max(180).default(10),
  /** Refinement stops once the bracket is narrower than this, seconds */
  timeToleranceSeconds: z.number().finite().positive().default(1),
  /** Cap on bisection / ternary iterations */
  maxIterations: z.number().int().positive().max(500).default(64),
  /** Solar altitude defining sunrise, degrees */
  threshold: z.number().finite().min(-90).max(90).default(SUN_ALTITUDE_THRESHOLD),
  /** Inverse solve: tangent (local minimum) matches must come this close, degrees */
  altitudeTolerance: z.number().finite().positive().default(0.05),
  /** Inverse solve: largest accepted wrapped azimuth error, degrees */
  azimuthTolerance: z.number().finite().positive().max(180).default(1),
  /** Maximization method for meridian transit */
  method: z.enum(['ternary', 'golden']).default('ternary'),
})

export type SolverOptions = z.output<typeof SolverOptionsSchema>

/** Options accepted by every public computation */
export type ComputeOptions = Partial<SolverOptions> & {
  /** Coordinate transform provider. Defaults to astronomy-engine. */
  provider?: CoordinateProvider
}

/** Solver defaults, as resolved from an empty options object */
export const DEFAULT_SOLVER_OPTIONS: Readonly<SolverOptions> = Object.freeze(SolverOptionsSchema.parse({}))

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Fill defaults and validate. Unknown keys (including `provider`) are ignored.
 * @throws InvalidInputError
 */
export function resolveSolverOptions(options: ComputeOptions = {}): SolverOptions {
  const parsed = SolverOptionsSchema.safeParse(options)
  if (!parsed.success) throw toInputError('Invalid solver options', parsed.error)
  return parsed.data
}

/** The provider to use for a computation */
export function resolveProvider(options: ComputeOptions = {}): CoordinateProvider {
  return options.provider ?? astronomyEngineProvider
}

/**
 * Validate an observer location, defaulting altitude to 0 m.
 * @throws InvalidInputError
 */
export function parseObserverLocation(input: ObserverLocationInput): ObserverLocation {
  const parsed = ObserverLocationSchema.safeParse(input)
  if (!parsed.success) throw toInputError('Invalid observer location', parsed.error)
  return parsed.data
}

/** Milliseconds for the configured coarse step and tolerance */
export function stepMs(options: SolverOptions): number {
  return options.stepMinutes * 60_000
}

export function toleranceMs(options: SolverOptions): number {
  return options.timeToleranceSeconds * 1000
}

function toInputError(context: string, error: z.ZodError): InvalidInputError {
  const details = error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
  return new InvalidInputError(`${context}: ${details}`)
}
