/**
 * ancient — Ghaṭi, Muhūrta and Yāma counted from sunrise.
 *
 * The day (sunrise to the next sunrise) is divided into
 *   60 ghaṭi  (24 min each on a 24 h day)
 *   30 muhūrta (2 ghaṭi)
 *    8 yāma   (7.5 ghaṭi, i.e. 3 h)
 *
 * With f = (now − sunrise) / dayLength:
 *   ghaṭi = 60f, muhūrta = 30f, yāma = 8f, each wrapped into [0, period).
 *
 * The day length is a fixed 24 h unless the following sunrise is supplied.
 */

import type {
  AncientTimeReading,
  AncientTimeResult,
  AncientUnitCount,
  DayLengthMode,
  ObserverLocation,
} from '../types.js'
import { ANCIENT_UNIT_PERIODS } from '../types.js'
import type { ComputeOptions } from '../config/index.js'
import { findSunrise } from '../events/index.js'
import { MS_PER_DAY, addDays, localDateOf } from '../time/index.js'
import { InvalidInputError } from '../errors/index.js'

// ─── Conversion ──────────────────────────────────────────────────────────────

export interface ConvertOptions {
  /**
   * The sunrise after `sunrise`. When given, the day is sunrise → nextSunrise
   * instead of a fixed 24 h.
   */
  nextSunrise?: Date
  /**
   * Used when `now` precedes `sunrise`: the reading then counts from this
   * earlier sunrise over a day of sunrise − previousSunrise.
   * Defaults to sunrise − 24 h.
   */
  previousSunrise?: Date
}

/**
 * Convert the time elapsed since sunrise into ancient units.
 *
 * When `now` is before `sunrise` the reading counts from the previous sunrise
 * instead, so elapsed time is never negative.
 *
 * @throws InvalidInputError if the supplied sunrises are out of order with `now`
 *
 * @example
 * ```ts
 * const r = convertToAncientTime(sunrise, new Date(sunrise.getTime() + 3 * 3600_000))
 * r.ghati.value   // 7.5
 * r.muhurta.value // 3.75
 * r.yama.value    // 1
 * ```
 */
export function convertToAncientTime(
  sunrise: Date,
  now: Date,
  options: ConvertOptions = {},
): AncientTimeReading {
  let from = sunrise
  let dayLengthMs = MS_PER_DAY

  if (now.getTime() < sunrise.getTime()) {
    from = options.previousSunrise ?? new Date(sunrise.getTime() - MS_PER_DAY)
    if (options.previousSunrise) dayLengthMs = sunrise.getTime() - from.getTime()
  } else if (options.nextSunrise) {
    dayLengthMs = options.nextSunrise.getTime() - sunrise.getTime()
  }

  if (!(dayLengthMs > 0)) {
    throw new InvalidInputError('Sunrises must be in chronological order')
  }

  const elapsedMs = now.getTime() - from.getTime()
  if (elapsedMs < 0) {
    throw new InvalidInputError(
      `No sunrise at or before ${now.toISOString()}: previous sunrise is ${from.toISOString()}`,
    )
  }

  const f = elapsedMs / dayLengthMs
  return {
    ghati: unitCount(f, ANCIENT_UNIT_PERIODS.ghati),
    muhurta: unitCount(f, ANCIENT_UNIT_PERIODS.muhurta),
    yama: unitCount(f, ANCIENT_UNIT_PERIODS.yama),
    sunrise: from,
    elapsedMs,
    dayLengthMs,
    dayFraction: f % 1,
  }
}

function unitCount(dayFraction: number, period: number): AncientUnitCount {
  const value = (dayFraction * period) % period
  const whole = Math.floor(value)
  return { value, whole, fraction: value - whole }
}

// ─── Full flow ───────────────────────────────────────────────────────────────

export interface AncientTimeOptions extends ComputeOptions {
  /**
   * 'fixed' (default): a 24 h day, 1 ghaṭi = 24 min.
   * 'sunrise-to-sunrise': the day runs to the following actual sunrise.
   */
  dayLength?: DayLengthMode
}

/**
 * Read the ancient clock for an observer at an instant.
 *
 * Finds the sunrise of the observer's civil date; before it, the previous
 * day's sunrise is used instead. The reading is null when the governing
 * sunrise (or, for 'sunrise-to-sunrise', the following one) does not exist:
 * polar day or polar night.
 *
 * @throws ProviderFailureError
 */
export function getAncientTime(
  location: ObserverLocation,
  now: Date,
  options: AncientTimeOptions = {},
): AncientTimeResult {
  const toNextSunrise = options.dayLength === 'sunrise-to-sunrise'
  const today = localDateOf(now, location.timezoneOffset)
  const todaySunrise = findSunrise(location, today, options)

  if (todaySunrise.found && now.getTime() >= todaySunrise.instant.getTime()) {
    if (!toNextSunrise) {
      return { sunrise: todaySunrise, reading: convertToAncientTime(todaySunrise.instant, now) }
    }
    const next = findSunrise(location, addDays(today, 1), options)
    return {
      sunrise: todaySunrise,
      reading: next.found
        ? convertToAncientTime(todaySunrise.instant, now, { nextSunrise: next.instant })
        : null,
    }
  }

  // Before today's sunrise, or no sunrise today: the day began at yesterday's sunrise
  const previous = findSunrise(location, addDays(today, -1), options)
  if (!previous.found) return { sunrise: previous, reading: null }
  if (!todaySunrise.found) {
    // Yesterday's sunrise exists but the day it began never ends with a sunrise
    return toNextSunrise
      ? { sunrise: previous, reading: null }
      : { sunrise: previous, reading: convertToAncientTime(previous.instant, now) }
  }

  return {
    sunrise: previous,
    reading: convertToAncientTime(previous.instant, now, {
      nextSunrise: toNextSunrise ? todaySunrise.instant : undefined,
    }),
  }
}
