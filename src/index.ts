/**
 * ghatika — Sky positions and the ancient Indian clock for any observer.
 *
 * Finds sunrise numerically (solar altitude crossing −0.8333°), counts the
 * day since sunrise in ghaṭi, muhūrta and yāma, places bright stars on the
 * observer's sky, and solves star transits and observed-position times.
 * Coordinate transforms come from astronomy-engine behind a replaceable
 * provider interface.
 *
 * Quick start:
 *   import { getSunrise, getAncientClock } from 'ghatika'
 *
 *   const ujjain = { latitude: 23.18, longitude: 75.78, timezoneOffset: 5.5 }
 *   const clock = getAncientClock(ujjain, new Date())
 *   console.log(clock.reading?.ghati.value)
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export {
  getSunrise,
  getSunEvents,
  getAncientClock,
  getStarPositions,
  getMeridianTransit,
  getTransitBySiderealTime,
  solveObservedTime,
  getBestFitTime,
  getSkySnapshot,
} from './api/index.js'

export type { StarInput, StarPositionOptions, SnapshotOptions } from './api/index.js'

// ─── Solver core (for callers managing their own windows) ─────────────────────

export { findSunrise, findSunset, findAltitudeCrossing } from './events/index.js'
export type { EventSearchOptions } from './events/index.js'
export { findMeridianTransit, findTimeForSiderealTime, hourAngle, SIDEREAL_RATE } from './transit/index.js'
export { solveTimeForPosition, findBestFitTime } from './inverse/index.js'
export type { ObservedPosition, BestFitOptions } from './inverse/index.js'
export { convertToAncientTime, getAncientTime } from './ancient/index.js'
export type { ConvertOptions, AncientTimeOptions } from './ancient/index.js'
export { AltitudeSampler } from './sampler/index.js'
export type { AltitudeSamples } from './sampler/index.js'
export { computeStarPositions, getLocalSiderealTime } from './sky/index.js'
export { getPanchang, VAAR_NAMES } from './panchang/index.js'

// ─── Provider ─────────────────────────────────────────────────────────────────

export { astronomyEngineProvider, createAstronomyEngineProvider } from './provider/index.js'
export type { CoordinateProvider, RefractionModel, AstronomyEngineProviderOptions } from './provider/index.js'

// ─── Configuration & errors ───────────────────────────────────────────────────

export {
  DEFAULT_SOLVER_OPTIONS,
  ObserverLocationSchema,
  SolverOptionsSchema,
  parseObserverLocation,
  resolveSolverOptions,
} from './config/index.js'
export type { ComputeOptions, SolverOptions, ObserverLocationInput } from './config/index.js'

export {
  GhatikaError,
  InvalidInputError,
  InvalidWindowError,
  ProviderFailureError,
} from './errors/index.js'

// ─── Utilities ────────────────────────────────────────────────────────────────

export {
  civilDayWindow,
  createTimeWindow,
  windowAround,
  localDateOf,
  parseLocalDate,
  parseLocalDateTime,
  formatLocal,
} from './time/index.js'
export { altAzToUnitVector, unitVectorToAltAz, bennettRefraction, removeRefraction } from './observer/index.js'
export { STAR_CATALOG, REFERENCE_STAR_NAME, findStar, toTarget } from './catalog/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  AltAz,
  Vec3,
  ObserverLocation,
  TimeWindow,
  CelestialTarget,
  StarTarget,
  SunTarget,
  SunriseResult,
  SunEvents,
  CrossingDirection,
  TransitResult,
  PositionCandidate,
  BestFitResult,
  MaximizeMethod,
  AncientUnit,
  AncientUnitCount,
  AncientTimeReading,
  AncientTimeResult,
  DayLengthMode,
  CatalogStar,
  StarPosition,
  PanchangDetails,
  SkySnapshot,
} from './types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export { SUN, SUN_ALTITUDE_THRESHOLD, TWILIGHT_THRESHOLDS, ANCIENT_UNIT_PERIODS } from './types.js'
