/**
 * inverse — Recover the time from an observed altitude (and azimuth).
 *
 * Over a day an object's altitude rises and falls, so a given altitude is
 * reached zero, one, or two times (morning and evening). The solver returns
 * every match in the window, not the first:
 *
 *   g(t) = altitude(t) − observed
 *
 *   1. sample g on the coarse grid
 *   2. bisect every sign change
 *   3. where |g| has an interior local minimum with no sign change next to it,
 *      the object culminates near the target between samples: find the
 *      culmination by ternary search; if it passes the target, bisect both
 *      sides of it (two roots in one cell), otherwise keep it as a grazing
 *      match when |g| < altitudeTolerance
 *   4. drop duplicates, then, when an azimuth was observed, drop candidates
 *      whose wrapped azimuth error exceeds azimuthTolerance
 *
 * An altitude the object never reaches yields an empty list, not an error.
 */

import type {
  AltAz,
  BestFitResult,
  CelestialTarget,
  ObserverLocation,
  PositionCandidate,
  TimeWindow,
} from '../types.js'
import type { ComputeOptions } from '../config/index.js'
import { resolveProvider, resolveSolverOptions, stepMs, toleranceMs } from '../config/index.js'
import { AltitudeSampler } from '../sampler/index.js'
import { argMax, azimuthDistance, bisect, gridPoints, maximize, minimize, normalizeDeg180 } from '../math/index.js'
import { windowAround } from '../time/index.js'
import { removeRefraction } from '../observer/index.js'

/** What the observer measured. Azimuth is optional. */
export interface ObservedPosition {
  altitude: number
  azimuth?: number
  /**
   * True when the altitude was read off the real sky, i.e. includes
   * atmospheric refraction. It is removed (Bennett) before matching against
   * the provider's airless altitudes.
   */
  refracted?: boolean
}

function airlessAltitude(observed: { altitude: number; refracted?: boolean }): number {
  return observed.refracted ? removeRefraction(observed.altitude) : observed.altitude
}

// ─── All matches in a window ─────────────────────────────────────────────────

/**
 * Find every instant in the window at which the target's altitude matches
 * the observed one (and its azimuth, when given).
 *
 * @returns Candidates in time order; empty when the position is never reached
 * @throws InvalidWindowError, ProviderFailureError
 */
export function solveTimeForPosition(
  location: ObserverLocation,
  target: CelestialTarget,
  observed: ObservedPosition,
  window: TimeWindow,
  options: ComputeOptions = {},
): PositionCandidate[] {
  const opts = resolveSolverOptions(options)
  const sampler = new AltitudeSampler(resolveProvider(options), location, target)
  const limits = { tolerance: toleranceMs(opts), maxIterations: opts.maxIterations }

  const targetAltitude = airlessAltitude(observed)
  const { times, altitudes } = sampler.sample(window, stepMs(opts))
  const g = (t: number) => sampler.altitudeAt(t) - targetAltitude
  const gs = altitudes.map(a => a - targetAltitude)

  const matches: number[] = []
  const crossesAfter: boolean[] = []

  // Sign changes
  for (let i = 1; i < times.length; i++) {
    const crosses = (gs[i - 1] < 0 && gs[i] >= 0) || (gs[i - 1] >= 0 && gs[i] < 0)
    crossesAfter.push(crosses)
    if (!crosses) continue
    const root = bisect(g, times[i - 1], times[i], limits)
    if (root !== null) matches.push(root)
  }

  // An interior local minimum of |g| with no sign change beside it means the
  // altitude culminates near the target: both roots may share one grid cell,
  // or the target is only grazed
  for (let i = 1; i < times.length - 1; i++) {
    if (crossesAfter[i - 1] || crossesAfter[i]) continue
    const here = Math.abs(gs[i])
    if (here > Math.abs(gs[i - 1]) || here > Math.abs(gs[i + 1])) continue

    const lo = times[i - 1]
    const hi = times[i + 1]
    // Below the target: upper culmination. At or above it: lower culmination.
    const below = gs[i] < 0
    const extreme = below ? maximize(g, lo, hi, limits) : minimize(g, lo, hi, limits)
    const atExtreme = g(extreme)

    if (below ? atExtreme >= 0 : atExtreme < 0) {
      for (const root of [bisect(g, lo, extreme, limits), bisect(g, extreme, hi, limits)]) {
        if (root !== null) matches.push(root)
      }
    } else if (Math.abs(atExtreme) < opts.altitudeTolerance) {
      matches.push(extreme)
    }
  }

  const candidates: PositionCandidate[] = []
  for (const t of dedupe(matches, 2 * limits.tolerance)) {
    const instant = new Date(Math.round(t))
    const position = sampler.positionAt(instant.getTime())
    const azimuthError =
      observed.azimuth === undefined ? null : azimuthDistance(position.azimuth, observed.azimuth)
    if (azimuthError !== null && azimuthError > opts.azimuthTolerance) continue
    candidates.push({
      instant,
      altitude: position.altitude,
      azimuth: position.azimuth,
      altitudeError: Math.abs(position.altitude - targetAltitude),
      azimuthError,
    })
  }
  return candidates
}

/** Sort ascending and collapse values closer than minGap */
function dedupe(values: number[], minGap: number): number[] {
  const sorted = [...values].sort((a, b) => a - b)
  const out: number[] = []
  for (const v of sorted) {
    if (out.length === 0 || v - out[out.length - 1] > minGap) out.push(v)
  }
  return out
}

// ─── Best fit around an estimate ─────────────────────────────────────────────

export interface BestFitOptions extends ComputeOptions {
  /** Half-width of the search around the estimate, hours (default 12) */
  searchHours?: number
}

/**
 * Find the single instant within ±searchHours of `approx` that minimizes the
 * combined angular error hypot(Δalt, Δaz) to an observed altitude + azimuth.
 *
 * Unlike solveTimeForPosition this always returns an answer; `errorDeg` tells
 * how good it is.
 *
 * @throws ProviderFailureError
 */
export function findBestFitTime(
  location: ObserverLocation,
  target: CelestialTarget,
  observed: AltAz & { refracted?: boolean },
  approx: Date,
  options: BestFitOptions = {},
): BestFitResult {
  const opts = resolveSolverOptions(options)
  const sampler = new AltitudeSampler(resolveProvider(options), location, target)
  const window = windowAround(approx, options.searchHours ?? 12)
  const targetAltitude = airlessAltitude(observed)

  const error = (t: number) => {
    const p = sampler.positionAt(t)
    return Math.hypot(p.altitude - targetAltitude, normalizeDeg180(p.azimuth - observed.azimuth))
  }

  const times = gridPoints(window.start.getTime(), window.end.getTime(), stepMs(opts))
  const errors = times.map(error)
  const i = argMax(errors.map(e => -e))

  let best = minimize(
    error,
    times[Math.max(0, i - 1)],
    times[Math.min(times.length - 1, i + 1)],
    { tolerance: toleranceMs(opts), maxIterations: opts.maxIterations },
  )
  if (error(best) > errors[i]) best = times[i]

  const instant = new Date(Math.round(best))
  return { instant, errorDeg: error(instant.getTime()) }
}
