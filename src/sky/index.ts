/**
 * sky — Star positions for one instant, ready for a sky plot.
 *
 * For each catalog star: altitude/azimuth from the coordinate provider, hour
 * angle from local sidereal time, and the ENU unit vector a 3D dome renderer
 * places it at.
 */

import type { CatalogStar, ObserverLocation, StarPosition } from '../types.js'
import type { ComputeOptions } from '../config/index.js'
import { resolveProvider } from '../config/index.js'
import { AltitudeSampler } from '../sampler/index.js'
import { toTarget, STAR_CATALOG } from '../catalog/index.js'
import { altAzToUnitVector } from '../observer/index.js'
import { hourAngle } from '../transit/index.js'
import { mod360 } from '../math/index.js'

/**
 * Local apparent sidereal time at an instant, hours [0, 24).
 * @throws ProviderFailureError
 */
export function getLocalSiderealTime(
  location: ObserverLocation,
  instant: Date,
  options: ComputeOptions = {},
): number {
  const sampler = new AltitudeSampler(resolveProvider(options), location, { kind: 'star', ra: 0, dec: 0 })
  return sampler.siderealTimeAt(instant.getTime())
}

/**
 * Position of every catalog star at an instant.
 * Azimuth is wrapped to [0, 360) and altitude clamped to [−90, 90].
 *
 * @throws ProviderFailureError
 */
export function computeStarPositions(
  location: ObserverLocation,
  instant: Date,
  catalog: readonly CatalogStar[] = STAR_CATALOG,
  options: ComputeOptions = {},
): StarPosition[] {
  const provider = resolveProvider(options)
  const lst = getLocalSiderealTime(location, instant, options)
  const t = instant.getTime()

  return catalog.map(star => {
    const position = new AltitudeSampler(provider, location, toTarget(star)).positionAt(t)
    const altitude = Math.max(-90, Math.min(90, position.altitude))
    const azimuth = mod360(position.azimuth)
    return {
      name: star.name,
      ra: star.ra,
      dec: star.dec,
      magnitude: star.magnitude,
      altitude,
      azimuth,
      visible: altitude > 0,
      hourAngle: hourAngle(lst, star.ra),
      enu: altAzToUnitVector(altitude, azimuth),
    }
  })
}
