/**
 * events — Sunrise, sunset, and twilight by threshold crossing.
 *
 * Finding when the Sun crosses an altitude is a root-finding problem:
 *
 *   f(t) = altitude(t) − h0 = 0
 *
 * where h0 is the threshold altitude. For sunrise/sunset the standard value is
 * −0.8333° (34' horizon refraction + 16' solar semi-diameter), applied to the
 * airless altitude.
 *
 * The solver brackets the crossing by sampling altitude at coarse steps over
 * the window, then bisects the first bracket whose sign change runs in the
 * requested direction. A window with no such bracket has no event: polar day
 * or polar night, reported as null / found: false.
 */

import type {
  CrossingDirection,
  ObserverLocation,
  SunEvents,
  SunriseResult,
  TimeWindow,
} from '../types.js'
import { SUN, TWILIGHT_THRESHOLDS } from '../types.js'
import type { ComputeOptions, SolverOptions } from '../config/index.js'
import { resolveProvider, resolveSolverOptions, stepMs, toleranceMs } from '../config/index.js'
import { AltitudeSampler } from '../sampler/index.js'
import { bisect } from '../math/index.js'
import { civilDayWindow } from '../time/index.js'

export interface EventSearchOptions extends ComputeOptions {
  /** Search domain. Defaults to the observer's civil day. */
  window?: TimeWindow
}

// ─── Crossing search ──────────────────────────────────────────────────────────

/**
 * Find the first time the sampler's target crosses `threshold` in the given
 * direction within the window.
 *
 * Algorithm: coarse sample (options.stepMinutes) to bracket sign changes, then
 * bisection to options.timeToleranceSeconds.
 *
 * @returns Crossing instant, or null if no crossing in that direction exists
 * @throws ProviderFailureError if any sampled instant fails
 */
export function findAltitudeCrossing(
  sampler: AltitudeSampler,
  window: TimeWindow,
  threshold: number,
  direction: CrossingDirection,
  options: SolverOptions,
): Date | null {
  const { times, altitudes } = sampler.sample(window, stepMs(options))
  const f = (t: number) => sampler.altitudeAt(t) - threshold
  const limits = { tolerance: toleranceMs(options), maxIterations: options.maxIterations }

  for (let i = 1; i < times.length; i++) {
    const prevF = altitudes[i - 1] - threshold
    const currF = altitudes[i] - threshold

    const isRisingCross  = direction === 'rising'  && prevF < 0 && currF >= 0
    const isSettingCross = direction === 'setting' && prevF >= 0 && currF < 0

    if (isRisingCross || isSettingCross) {
      const root = bisect(f, times[i - 1], times[i], limits)
      if (root !== null) return new Date(Math.round(root))
    }
  }

  return null
}

// ─── Sunrise / sunset ────────────────────────────────────────────────────────

/**
 * Find sunrise: the Sun's altitude rising through options.threshold
 * (default −0.8333°) on the observer's civil day.
 *
 * @param location - Observer
 * @param date - Civil date on the observer's clock (UTC calendar fields are read)
 * @param options - Threshold, step, tolerance, provider, window override
 * @returns { found: true, instant } or { found: false, instant: null } when
 *   the Sun does not rise inside the window
 * @throws InvalidWindowError, ProviderFailureError
 *
 * @example
 * ```ts
 * const result = findSunrise(
 *   { latitude: 23, longitude: 77, altitude: 0, timezoneOffset: 5.5 },
 *   new Date('2024-03-20'),
 * )
 * if (result.found) console.log(result.instant.toISOString())
 * ```
 */
export function findSunrise(
  location: ObserverLocation,
  date: Date,
  options: EventSearchOptions = {},
): SunriseResult {
  const opts = resolveSolverOptions(options)
  const window = options.window ?? civilDayWindow(date, location.timezoneOffset)
  const sampler = new AltitudeSampler(resolveProvider(options), location, SUN)

  const instant = findAltitudeCrossing(sampler, window, opts.threshold, 'rising', opts)
  return instant ? { found: true, instant } : { found: false, instant: null }
}

/**
 * Find sunset: the Sun's altitude falling through options.threshold on the
 * observer's civil day. Null when the Sun does not set inside the window.
 */
export function findSunset(
  location: ObserverLocation,
  date: Date,
  options: EventSearchOptions = {},
): Date | null {
  const opts = resolveSolverOptions(options)
  const window = options.window ?? civilDayWindow(date, location.timezoneOffset)
  const sampler = new AltitudeSampler(resolveProvider(options), location, SUN)
  return findAltitudeCrossing(sampler, window, opts.threshold, 'setting', opts)
}

/**
 * Sunrise, sunset, and twilight times for the observer's civil day.
 * All events share one sampler, so the provider is called once per instant.
 */
export function getSunEvents(
  location: ObserverLocation,
  date: Date,
  options: EventSearchOptions = {},
): SunEvents {
  const opts = resolveSolverOptions(options)
  const window = options.window ?? civilDayWindow(date, location.timezoneOffset)
  const sampler = new AltitudeSampler(resolveProvider(options), location, SUN)

  const cross = (threshold: number, direction: CrossingDirection) =>
    findAltitudeCrossing(sampler, window, threshold, direction, opts)

  const sunrise = cross(opts.threshold, 'rising')
  const sunset = cross(opts.threshold, 'setting')

  const dayLengthMs =
    sunrise && sunset && sunset.getTime() > sunrise.getTime()
      ? sunset.getTime() - sunrise.getTime()
      : null

  return {
    sunrise,
    sunset,
    civilDawn: cross(TWILIGHT_THRESHOLDS.civil, 'rising'),
    civilDusk: cross(TWILIGHT_THRESHOLDS.civil, 'setting'),
    nauticalDusk: cross(TWILIGHT_THRESHOLDS.nautical, 'setting'),
    astronomicalDusk: cross(TWILIGHT_THRESHOLDS.astronomical, 'setting'),
    dayLengthMs,
  }
}
