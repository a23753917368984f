/**
 * panchang — Almanac details for the observer's day.
 *
 * Only the weekday (Vaar) is computed. Tithi, Nakshatra, Yoga and Karana are
 * fixed demonstration values and the result says so (`demo: true`); a real
 * almanac needs lunar ephemerides that this library does not carry.
 */

import type { ObserverLocation, PanchangDetails } from '../types.js'
import { formatDate, localDateOf } from '../time/index.js'

/** Sanskrit weekday names, Sunday first (matching Date#getUTCDay) */
export const VAAR_NAMES = [
  'Ravivāra',
  'Somavāra',
  'Maṅgalavāra',
  'Budhavāra',
  'Guruvāra',
  'Śukravāra',
  'Śanivāra',
] as const

const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const

const DEMO_VALUES = {
  tithi: 'Dashami',
  nakshatra: 'Rohini',
  yoga: 'Siddha Yoga',
  karana: 'Balava',
} as const

/** Panchang for the observer's civil date at `instant` */
export function getPanchang(location: ObserverLocation, instant: Date): PanchangDetails {
  const localDate = localDateOf(instant, location.timezoneOffset)
  const day = localDate.getUTCDay()
  return {
    date: formatDate(localDate),
    vaar: VAAR_NAMES[day],
    weekday: WEEKDAY_NAMES[day],
    ...DEMO_VALUES,
    demo: true,
  }
}
