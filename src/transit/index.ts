/**
 * transit — Meridian transit (upper culmination) of a fixed star.
 *
 * Two routes to the same instant:
 *
 * 1. findMeridianTransit — maximize altitude(t) over the window.
 *    Over a whole day altitude is not unimodal (it rises, peaks, sets, bottoms
 *    out), so the coarse grid first locates the highest sample; around it,
 *    [t(i−1), t(i+1)], altitude is unimodal and ternary or golden-section
 *    search narrows the peak down to the time tolerance.
 *
 * 2. findTimeForSiderealTime — transit happens when LST = RA. Solve
 *    LST(t) − target = 0 by bisection, starting from a linear estimate
 *    (sidereal time advances 1.0027379 h per solar hour).
 *
 * Only fixed-declination targets are supported: for a fast-moving body the
 * maximum-altitude instant and the meridian crossing differ.
 */

import type { ObserverLocation, StarTarget, CelestialTarget, TimeWindow, TransitResult } from '../types.js'
import type { ComputeOptions } from '../config/index.js'
import { resolveProvider, resolveSolverOptions, stepMs, toleranceMs } from '../config/index.js'
import { AltitudeSampler } from '../sampler/index.js'
import { argMax, bisect, maximize, normalizeHours12 } from '../math/index.js'
import { MS_PER_HOUR, MS_PER_MINUTE } from '../time/index.js'
import { GhatikaError, InvalidInputError } from '../errors/index.js'

/** Sidereal hours elapsed per solar (UT) hour */
export const SIDEREAL_RATE = 1.00273790935

// ─── Altitude maximization ───────────────────────────────────────────────────

/**
 * Find the instant of maximum altitude of a fixed star within the window.
 *
 * A maximum always exists on a closed window, so this never fails for lack of
 * a bracket. When the star culminates outside the window the result sits on
 * the window edge and `atWindowEdge` is true.
 *
 * @throws InvalidInputError for the Sun, InvalidWindowError, ProviderFailureError
 */
export function findMeridianTransit(
  location: ObserverLocation,
  target: CelestialTarget,
  window: TimeWindow,
  options: ComputeOptions = {},
): TransitResult {
  const star = requireStar(target)
  const opts = resolveSolverOptions(options)
  const sampler = new AltitudeSampler(resolveProvider(options), location, star)

  const { times, altitudes } = sampler.sample(window, stepMs(opts))
  const i = argMax(altitudes)
  const lo = times[Math.max(0, i - 1)]
  const hi = times[Math.min(times.length - 1, i + 1)]

  const tolerance = toleranceMs(opts)
  let peak = maximize(
    t => sampler.altitudeAt(t),
    lo,
    hi,
    { tolerance, maxIterations: opts.maxIterations },
    opts.method,
  )
  // Never return something lower than the best coarse sample
  if (sampler.altitudeAt(peak) < altitudes[i]) peak = times[i]

  const instant = new Date(Math.round(peak))
  const { altitude, azimuth } = sampler.positionAt(instant.getTime())
  const atWindowEdge =
    instant.getTime() - window.start.getTime() <= tolerance ||
    window.end.getTime() - instant.getTime() <= tolerance

  return { instant, altitude, azimuth, atWindowEdge }
}

// ─── Sidereal time route ─────────────────────────────────────────────────────

/** Local hour angle H = LST − RA, hours wrapped to [−12, 12). Negative = east of the meridian. */
export function hourAngle(localSiderealTime: number, ra: number): number {
  return normalizeHours12(localSiderealTime - ra)
}

/**
 * Find the instant nearest `approx` at which local sidereal time equals
 * `targetLst` (hours). With targetLst = RA this is the star's transit.
 *
 * The wrapped difference LST(t) − target jumps by 24 h half a day away from
 * the root, so the bracket is kept around a linear first estimate where the
 * function is continuous.
 *
 * @throws ProviderFailureError
 */
export function findTimeForSiderealTime(
  location: ObserverLocation,
  targetLst: number,
  approx: Date,
  options: ComputeOptions = {},
): Date {
  const opts = resolveSolverOptions(options)
  const provider = resolveProvider(options)
  // Sidereal time does not depend on the target; any one will do
  const sampler = new AltitudeSampler(provider, location, { kind: 'star', ra: targetLst, dec: 0 })
  const f = (t: number) => normalizeHours12(sampler.siderealTimeAt(t) - targetLst)

  const t0 = approx.getTime()
  const guess = t0 - (f(t0) / SIDEREAL_RATE) * MS_PER_HOUR
  const limits = { tolerance: toleranceMs(opts), maxIterations: opts.maxIterations }

  // Widen the bracket until it straddles the root (a few minutes suffice)
  for (let halfWidth = 10 * MS_PER_MINUTE; halfWidth <= 2 * MS_PER_HOUR; halfWidth *= 2) {
    const root = bisect(f, guess - halfWidth, guess + halfWidth, limits)
    if (root !== null) return new Date(Math.round(root))
  }
  // Unreachable for a provider whose LST advances steadily
  throw new GhatikaError(`Sidereal time ${targetLst} h not bracketed near ${approx.toISOString()}`)
}

function requireStar(target: CelestialTarget): StarTarget {
  if (target.kind !== 'star') {
    throw new InvalidInputError('Meridian transit requires a fixed star; the Sun moves in declination')
  }
  return target
}
