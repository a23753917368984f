/**
 * sampler — Evaluates "position of target X at time T" over a search window.
 *
 * Every solver reaches the coordinate provider through an AltitudeSampler.
 * The sampler
 *   - memoizes provider results by instant, so the coarse grid and the
 *     refinement passes of one computation never ask twice for the same time
 *   - turns any provider exception, or a non-finite result, into a
 *     ProviderFailureError carrying the offending instant
 *
 * A sampler lives for one computation and is then discarded.
 */

import type { AltAz, CelestialTarget, ObserverLocation, TimeWindow } from '../types.js'
import type { CoordinateProvider } from '../provider/index.js'
import { ProviderFailureError } from '../errors/index.js'
import { gridPoints } from '../math/index.js'
import { assertValidWindow } from '../time/index.js'

export interface AltitudeSamples {
  /** Sample instants, ms since epoch, ascending; first = window start, last = window end */
  times: number[]
  /** Altitude at each sample, degrees */
  altitudes: number[]
}

export class AltitudeSampler {
  private readonly cache = new Map<number, AltAz>()

  constructor(
    readonly provider: CoordinateProvider,
    readonly location: ObserverLocation,
    readonly target: CelestialTarget,
  ) {}

  /** Number of distinct instants the provider has been asked about */
  get evaluations(): number {
    return this.cache.size
  }

  /**
   * Horizontal position at an instant (ms since epoch).
   * @throws ProviderFailureError
   */
  positionAt(t: number): AltAz {
    const cached = this.cache.get(t)
    if (cached) return cached

    const instant = new Date(t)
    let position: AltAz
    try {
      position = this.provider.altAz(this.location, this.target, instant)
    } catch (err) {
      throw new ProviderFailureError(instant, err)
    }
    if (!Number.isFinite(position.altitude) || !Number.isFinite(position.azimuth)) {
      throw new ProviderFailureError(instant, new Error('non-finite coordinates'))
    }

    this.cache.set(t, position)
    return position
  }

  altitudeAt(t: number): number {
    return this.positionAt(t).altitude
  }

  /**
   * Local sidereal time at an instant, hours.
   * @throws ProviderFailureError
   */
  siderealTimeAt(t: number): number {
    const instant = new Date(t)
    let lst: number
    try {
      lst = this.provider.siderealTime(this.location, instant)
    } catch (err) {
      throw new ProviderFailureError(instant, err)
    }
    if (!Number.isFinite(lst)) throw new ProviderFailureError(instant, new Error('non-finite sidereal time'))
    return lst
  }

  /**
   * Sample altitude across a window at spacing ≤ stepMs, endpoints included.
   * Fails on the first provider failure; no sample is ever skipped.
   * @throws InvalidWindowError, ProviderFailureError
   */
  sample(window: TimeWindow, stepMs: number): AltitudeSamples {
    assertValidWindow(window)
    const times = gridPoints(window.start.getTime(), window.end.getTime(), stepMs)
    const altitudes = times.map(t => this.altitudeAt(t))
    return { times, altitudes }
  }
}
