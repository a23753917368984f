/**
 * observer — Local horizon geometry and atmospheric refraction.
 *
 * The local horizon frame is East-North-Up (ENU):
 *   x = East, y = North, z = Up
 * Azimuth is measured from North clockwise (0° = N, 90° = E); altitude from
 * the horizon, positive up. The rim of a planetarium dome is altitude 0.
 *
 * Atmospheric refraction is significant near the horizon (up to ~34' at
 * altitude 0°). The Bennett (1982) formula is the standard practical
 * approximation; it accepts pressure and temperature.
 *
 * References:
 *   Bennett (1982), Astronomical Refraction for Upper and Lower Limbs
 */

import type { AltAz, ObserverLocation, Vec3 } from '../types.js'
import { DEG2RAD, RAD2DEG, mod360 } from '../math/index.js'

// ─── Location helpers ────────────────────────────────────────────────────────

/**
 * UTC offset of local mean time at a longitude, hours (15° per hour).
 * Used as the default clock when no timezone is given.
 */
export function localMeanTimeOffset(longitude: number): number {
  return longitude / 15
}

/** Human-readable position, e.g. '23.00° N, 77.00° E' */
export function describeLocation(location: ObserverLocation): string {
  const lat = `${Math.abs(location.latitude).toFixed(2)}° ${location.latitude < 0 ? 'S' : 'N'}`
  const lon = `${Math.abs(location.longitude).toFixed(2)}° ${location.longitude < 0 ? 'W' : 'E'}`
  const label = `${lat}, ${lon}`
  return location.name ? `${location.name} (${label})` : label
}

// ─── ENU ↔ alt/az ────────────────────────────────────────────────────────────

/**
 * Convert altitude/azimuth to a unit vector in the ENU frame.
 *
 * East  = cos(alt)·sin(az)
 * North = cos(alt)·cos(az)
 * Up    = sin(alt)
 */
export function altAzToUnitVector(altitude: number, azimuth: number): Vec3 {
  const alt = altitude * DEG2RAD
  const az = azimuth * DEG2RAD
  return [
    Math.cos(alt) * Math.sin(az),
    Math.cos(alt) * Math.cos(az),
    Math.sin(alt),
  ]
}

/**
 * Convert an ENU vector (any length) to altitude and azimuth.
 * Azimuth is 0 for a vector pointing straight up or down.
 */
export function unitVectorToAltAz(enu: Vec3): AltAz {
  const [e, n, u] = enu
  const horiz = Math.sqrt(e * e + n * n)
  return {
    altitude: Math.atan2(u, horiz) * RAD2DEG,
    // atan2(east, north) gives bearing from North
    azimuth: horiz === 0 ? 0 : mod360(Math.atan2(e, n) * RAD2DEG),
  }
}

// ─── Atmospheric refraction ───────────────────────────────────────────────────

/**
 * Bennett (1982) atmospheric refraction for a geometric (airless) altitude.
 *
 * Formula: R = cot(h + 7.31 / (h + 4.4)) / 60  [degrees]
 * Pressure/temperature correction:
 *   R_adj = R × (P / 1010) × (283 / (273 + T))
 *
 * @param altitudeDeg - Geometric (airless) altitude in degrees
 * @param pressure - Atmospheric pressure in millibars (default 1013.25)
 * @param temperature - Temperature in Celsius (default 15)
 * @returns Refraction to add to the altitude, in degrees
 */
export function bennettRefraction(
  altitudeDeg: number,
  pressure = 1013.25,
  temperature = 15,
): number {
  // The formula diverges below ~−1°
  if (altitudeDeg < -1) return 0

  const argDeg = altitudeDeg + 7.31 / (altitudeDeg + 4.4)
  const R = 1 / (Math.tan(argDeg * DEG2RAD) * 60)

  const corrected = R * (pressure / 1010) * (283 / (273 + temperature))
  return Math.max(0, corrected)
}

/**
 * Remove refraction from an apparent (observed) altitude to get the airless one.
 * Fixed-point inversion of the Bennett formula; converges in 3–4 iterations.
 */
export function removeRefraction(
  apparentAlt: number,
  pressure = 1013.25,
  temperature = 15,
): number {
  let airless = apparentAlt
  for (let i = 0; i < 4; i++) {
    airless = apparentAlt - bennettRefraction(airless, pressure, temperature)
  }
  return airless
}
