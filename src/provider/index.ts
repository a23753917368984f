/**
 * provider — The coordinate transform provider consumed by every solver.
 *
 * The solvers only ever need two pure functions:
 *
 *   altAz(location, target, instant)  → horizontal coordinates
 *   siderealTime(location, instant)   → local apparent sidereal time, hours
 *
 * The default implementation delegates to astronomy-engine:
 *   Sun:   topocentric equator-of-date RA/Dec (aberration corrected)
 *   Stars: J2000 catalog direction rotated to the true equator of date
 *          (precession + nutation), then to the observer's horizon.
 *
 * Horizontal coordinates are airless by default. The sunrise threshold
 * (−0.8333°) already contains the standard horizon refraction, so applying
 * refraction here as well would count it twice.
 */

import * as Astronomy from 'astronomy-engine'
import type { AltAz, CelestialTarget, ObserverLocation } from '../types.js'
import { mod24, mod360 } from '../math/index.js'

// ─── Interface ───────────────────────────────────────────────────────────────

export interface CoordinateProvider {
  /** Horizontal coordinates of a target for an observer at an instant */
  altAz(location: ObserverLocation, target: CelestialTarget, instant: Date): AltAz
  /** Local apparent sidereal time in hours [0, 24) */
  siderealTime(location: ObserverLocation, instant: Date): number
}

/** Refraction model applied to altitudes */
export type RefractionModel = 'none' | 'normal'

export interface AstronomyEngineProviderOptions {
  /**
   * 'none' (default): geometric altitude.
   * 'normal': astronomy-engine's standard-atmosphere refraction.
   */
  refraction?: RefractionModel
}

// ─── astronomy-engine implementation ─────────────────────────────────────────

/** Build a provider backed by astronomy-engine */
export function createAstronomyEngineProvider(
  options: AstronomyEngineProviderOptions = {},
): CoordinateProvider {
  const refraction = options.refraction === 'normal' ? 'normal' : undefined

  return {
    altAz(location, target, instant) {
      const time = toAstroTime(instant)
      const observer = toObserver(location)
      const { ra, dec } = equatorOfDate(target, time, observer)
      const hor = Astronomy.Horizon(time, observer, ra, dec, refraction)
      return {
        altitude: Math.max(-90, Math.min(90, hor.altitude)),
        azimuth: mod360(hor.azimuth),
      }
    },

    siderealTime(location, instant) {
      const gast = Astronomy.SiderealTime(toAstroTime(instant))
      return mod24(gast + location.longitude / 15)
    },
  }
}

/** Default provider: astronomy-engine, airless altitudes */
export const astronomyEngineProvider: CoordinateProvider = createAstronomyEngineProvider()

// ─── Internal helpers ─────────────────────────────────────────────────────────

function toAstroTime(instant: Date): Astronomy.AstroTime {
  if (Number.isNaN(instant.getTime())) throw new RangeError('Invalid instant')
  return Astronomy.MakeTime(instant)
}

function toObserver(location: ObserverLocation): Astronomy.Observer {
  return new Astronomy.Observer(location.latitude, location.longitude, location.altitude)
}

/**
 * Equator-of-date RA (hours) and Dec (degrees) of a target, as Horizon expects.
 */
function equatorOfDate(
  target: CelestialTarget,
  time: Astronomy.AstroTime,
  observer: Astronomy.Observer,
): { ra: number; dec: number } {
  if (target.kind === 'sun') {
    const equ = Astronomy.Equator(Astronomy.Body.Sun, time, observer, true, true)
    return { ra: equ.ra, dec: equ.dec }
  }

  // Catalog direction as a unit vector in J2000 equatorial coordinates
  const j2000 = Astronomy.VectorFromSphere(new Astronomy.Spherical(target.dec, target.ra * 15, 1), time)
  const ofDate = Astronomy.RotateVector(Astronomy.Rotation_EQJ_EQD(time), j2000)
  const equ = Astronomy.EquatorFromVector(ofDate)
  return { ra: equ.ra, dec: equ.dec }
}
