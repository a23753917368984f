/**
 * api — User-facing functions.
 *
 * This is the only module users need to import directly. Everything here
 * validates its inputs (observer location, options, dates, star names) and
 * then delegates to the solver modules.
 *
 * All functions are synchronous and keep no state between calls: a display
 * that refreshes every second simply calls getSkySnapshot() again.
 *
 * Civil dates may be given as 'YYYY-MM-DD' strings or as Dates whose UTC
 * calendar fields name the observer's date.
 */

import type {
  AncientTimeResult,
  CatalogStar,
  PositionCandidate,
  SkySnapshot,
  StarPosition,
  StarTarget,
  SunEvents,
  SunriseResult,
  TransitResult,
  BestFitResult,
  AltAz,
} from '../types.js'
import type { ComputeOptions, ObserverLocationInput } from '../config/index.js'
import { parseObserverLocation, resolveSolverOptions } from '../config/index.js'
import { civilDayWindow, formatLocal, parseLocalDate } from '../time/index.js'
import { findSunrise, getSunEvents as eventsGetSunEvents } from '../events/index.js'
import type { AncientTimeOptions } from '../ancient/index.js'
import { getAncientTime } from '../ancient/index.js'
import { findMeridianTransit, findTimeForSiderealTime } from '../transit/index.js'
import type { BestFitOptions, ObservedPosition } from '../inverse/index.js'
import { findBestFitTime, solveTimeForPosition } from '../inverse/index.js'
import { computeStarPositions, getLocalSiderealTime } from '../sky/index.js'
import { STAR_CATALOG, findStar, toTarget } from '../catalog/index.js'
import { getPanchang } from '../panchang/index.js'
import { InvalidInputError } from '../errors/index.js'

/** A star given by catalog name (any fragment) or by coordinates */
export type StarInput = string | StarTarget

// ─── Sun ─────────────────────────────────────────────────────────────────────

/**
 * Sunrise on the observer's civil date.
 *
 * @example
 * ```ts
 * const sunrise = getSunrise({ latitude: 23, longitude: 77, timezoneOffset: 5.5 }, '2024-03-20')
 * if (sunrise.found) console.log(sunrise.instant)
 * ```
 */
export function getSunrise(
  location: ObserverLocationInput,
  date: Date | string,
  options?: ComputeOptions,
): SunriseResult {
  const loc = parseObserverLocation(location)
  return findSunrise(loc, resolveDate(date), options)
}

/** Sunrise, sunset and twilight on the observer's civil date */
export function getSunEvents(
  location: ObserverLocationInput,
  date: Date | string,
  options?: ComputeOptions,
): SunEvents {
  const loc = parseObserverLocation(location)
  return eventsGetSunEvents(loc, resolveDate(date), options)
}

// ─── Ancient clock ───────────────────────────────────────────────────────────

/**
 * Ghaṭi / muhūrta / yāma at an instant, counted from the governing sunrise.
 * `reading` is null in polar day or polar night.
 */
export function getAncientClock(
  location: ObserverLocationInput,
  now: Date = new Date(),
  options?: AncientTimeOptions,
): AncientTimeResult {
  const loc = parseObserverLocation(location)
  return getAncientTime(loc, checkInstant(now), options)
}

// ─── Stars ───────────────────────────────────────────────────────────────────

export interface StarPositionOptions extends ComputeOptions {
  /** Stars to place. Defaults to the built-in catalog. */
  catalog?: readonly CatalogStar[]
  /** Drop stars below the horizon */
  visibleOnly?: boolean
}

/** Altitude/azimuth of every catalog star at an instant */
export function getStarPositions(
  location: ObserverLocationInput,
  instant: Date = new Date(),
  options: StarPositionOptions = {},
): StarPosition[] {
  const loc = parseObserverLocation(location)
  const positions = computeStarPositions(loc, checkInstant(instant), options.catalog ?? STAR_CATALOG, options)
  return options.visibleOnly ? positions.filter(p => p.visible) : positions
}

/**
 * Meridian transit of a star on the observer's civil date: the instant of
 * maximum altitude, found by ternary (or golden-section) search.
 */
export function getMeridianTransit(
  location: ObserverLocationInput,
  star: StarInput,
  date: Date | string,
  options?: ComputeOptions,
): TransitResult {
  const loc = parseObserverLocation(location)
  const window = civilDayWindow(resolveDate(date), loc.timezoneOffset)
  return findMeridianTransit(loc, resolveStar(star), window, options)
}

/**
 * Transit of a star nearest `approx`, found where local sidereal time equals
 * the star's right ascension.
 */
export function getTransitBySiderealTime(
  location: ObserverLocationInput,
  star: StarInput,
  approx: Date,
  options?: ComputeOptions,
): Date {
  const loc = parseObserverLocation(location)
  return findTimeForSiderealTime(loc, resolveStar(star).ra, checkInstant(approx), options)
}

/**
 * Every instant on the observer's civil date at which a star stands at the
 * observed altitude (and azimuth, if given). Empty when never reached.
 */
export function solveObservedTime(
  location: ObserverLocationInput,
  star: StarInput,
  observed: ObservedPosition,
  date: Date | string,
  options?: ComputeOptions,
): PositionCandidate[] {
  const loc = parseObserverLocation(location)
  checkObserved(observed.altitude, observed.azimuth)
  const window = civilDayWindow(resolveDate(date), loc.timezoneOffset)
  return solveTimeForPosition(loc, resolveStar(star), observed, window, options)
}

/** The instant within ±12 h of `approx` that best matches an observed alt/az */
export function getBestFitTime(
  location: ObserverLocationInput,
  star: StarInput,
  observed: AltAz & { refracted?: boolean },
  approx: Date,
  options?: BestFitOptions,
): BestFitResult {
  const loc = parseObserverLocation(location)
  checkObserved(observed.altitude, observed.azimuth)
  return findBestFitTime(loc, resolveStar(star), observed, checkInstant(approx), options)
}

// ─── Snapshot ────────────────────────────────────────────────────────────────

export interface SnapshotOptions extends AncientTimeOptions {
  catalog?: readonly CatalogStar[]
  /** Include the (demo) Panchang. Default true. */
  panchang?: boolean
}

/**
 * One complete refresh: clock, sidereal time, sunrise and ancient units, star
 * positions and Panchang. A provider failure anywhere aborts the whole
 * snapshot; nothing partial is returned.
 *
 * @example
 * ```ts
 * const snap = getSkySnapshot({ latitude: 23, longitude: 77, timezoneOffset: 5.5 })
 * console.log(snap.localTime, snap.ancient.reading?.ghati.value)
 * ```
 */
export function getSkySnapshot(
  location: ObserverLocationInput,
  now: Date = new Date(),
  options: SnapshotOptions = {},
): SkySnapshot {
  const loc = parseObserverLocation(location)
  const instant = checkInstant(now)
  // Fail on bad options before any sampling
  resolveSolverOptions(options)

  return {
    instantUTC: instant,
    location: loc,
    localTime: formatLocal(instant, loc.timezoneOffset),
    localSiderealTime: getLocalSiderealTime(loc, instant, options),
    ancient: getAncientTime(loc, instant, options),
    stars: computeStarPositions(loc, instant, options.catalog ?? STAR_CATALOG, options),
    panchang: options.panchang === false ? null : getPanchang(loc, instant),
  }
}

// ─── Input helpers ───────────────────────────────────────────────────────────

function resolveDate(date: Date | string): Date {
  return typeof date === 'string' ? parseLocalDate(date) : checkInstant(date)
}

function resolveStar(star: StarInput): StarTarget {
  if (typeof star === 'string') return toTarget(findStar(star))
  if (!(star.ra >= 0 && star.ra < 24) || !(star.dec >= -90 && star.dec <= 90)) {
    throw new InvalidInputError(`Invalid star coordinates: RA ${star.ra} h, Dec ${star.dec}°`)
  }
  return star
}

function checkInstant(instant: Date): Date {
  if (Number.isNaN(instant.getTime())) throw new InvalidInputError('Invalid date')
  return instant
}

function checkObserved(altitude: number, azimuth: number | undefined): void {
  if (!(altitude >= -90 && altitude <= 90)) {
    throw new InvalidInputError(`Observed altitude must be within [-90, 90], got ${altitude}`)
  }
  if (azimuth !== undefined && !Number.isFinite(azimuth)) {
    throw new InvalidInputError(`Observed azimuth must be a finite number, got ${azimuth}`)
  }
}
