/**
 * time — Civil time, timezone offsets, and search windows.
 *
 * Instants are JavaScript Dates (UTC). A *local civil date* is represented as a
 * Date at UTC midnight whose UTC calendar fields name the observer's date:
 * `new Date('2024-03-20T00:00:00Z')` means "20 March 2024 on the observer's
 * clock", whatever the offset.
 *
 * Offsets are fixed hours east of UTC (IST = +5.5). Daylight-saving rules are
 * the caller's business: pass the offset in force on the date.
 */

import type { TimeWindow } from '../types.js'
import { InvalidInputError, InvalidWindowError } from '../errors/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export const MS_PER_SECOND = 1000
export const MS_PER_MINUTE = 60_000
export const MS_PER_HOUR = 3_600_000
export const MS_PER_DAY = 86_400_000

// ─── Windows ─────────────────────────────────────────────────────────────────

/**
 * Build a search window, failing fast unless start < end.
 * @throws InvalidWindowError
 */
export function createTimeWindow(start: Date, end: Date): TimeWindow {
  assertValidWindow({ start, end })
  return { start, end }
}

/** @throws InvalidWindowError unless start < end (and both are valid dates) */
export function assertValidWindow(window: TimeWindow): void {
  const s = window.start.getTime()
  const e = window.end.getTime()
  if (!(s < e)) throw new InvalidWindowError(window.start, window.end)
}

/**
 * The window spanning one civil day on the observer's clock:
 * local midnight to the following local midnight.
 *
 * @param localDate - Civil date (UTC calendar fields are read)
 * @param timezoneOffset - Hours east of UTC
 */
export function civilDayWindow(localDate: Date, timezoneOffset: number): TimeWindow {
  const midnightUTC = Date.UTC(
    localDate.getUTCFullYear(),
    localDate.getUTCMonth(),
    localDate.getUTCDate(),
  )
  const start = midnightUTC - timezoneOffset * MS_PER_HOUR
  return createTimeWindow(new Date(start), new Date(start + MS_PER_DAY))
}

/** A window of ±halfWidthHours around an instant */
export function windowAround(instant: Date, halfWidthHours: number): TimeWindow {
  const t = instant.getTime()
  const h = halfWidthHours * MS_PER_HOUR
  return createTimeWindow(new Date(t - h), new Date(t + h))
}

// ─── Civil dates ─────────────────────────────────────────────────────────────

/** The observer's civil date at an instant, as a UTC-midnight Date */
export function localDateOf(instant: Date, timezoneOffset: number): Date {
  const shifted = new Date(instant.getTime() + timezoneOffset * MS_PER_HOUR)
  return new Date(Date.UTC(shifted.getUTCFullYear(), shifted.getUTCMonth(), shifted.getUTCDate()))
}

/** Move a civil date by whole days */
export function addDays(localDate: Date, days: number): Date {
  return new Date(localDate.getTime() + days * MS_PER_DAY)
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/
const DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/

/**
 * Parse 'YYYY-MM-DD' into a civil date.
 * @throws InvalidInputError on malformed or impossible dates
 */
export function parseLocalDate(text: string): Date {
  const m = DATE_RE.exec(text.trim())
  if (!m) throw new InvalidInputError(`Invalid date: ${text}. Use YYYY-MM-DD format.`)
  return checkedUTC(text, Number(m[1]), Number(m[2]), Number(m[3]), 0, 0, 0)
}

/**
 * Parse a wall-clock reading 'YYYY-MM-DDTHH:MM[:SS]' on the observer's clock
 * into a UTC instant.
 * @throws InvalidInputError on malformed input
 */
export function parseLocalDateTime(text: string, timezoneOffset: number): Date {
  const m = DATE_TIME_RE.exec(text.trim())
  if (!m) throw new InvalidInputError(`Invalid date-time: ${text}. Use YYYY-MM-DDTHH:MM[:SS] format.`)
  const wall = checkedUTC(
    text,
    Number(m[1]), Number(m[2]), Number(m[3]),
    Number(m[4]), Number(m[5]), Number(m[6] ?? '0'),
  )
  return new Date(wall.getTime() - timezoneOffset * MS_PER_HOUR)
}

function checkedUTC(
  text: string,
  year: number, month: number, day: number,
  hour: number, minute: number, second: number,
): Date {
  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (
    d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day ||
    d.getUTCHours() !== hour || d.getUTCMinutes() !== minute || d.getUTCSeconds() !== second
  ) {
    throw new InvalidInputError(`Invalid date: ${text}`)
  }
  return d
}

// ─── Formatting ──────────────────────────────────────────────────────────────

/** Format an instant on the observer's clock as 'YYYY-MM-DD HH:MM:SS' */
export function formatLocal(instant: Date, timezoneOffset: number): string {
  const shifted = new Date(Math.round((instant.getTime() + timezoneOffset * MS_PER_HOUR) / 1000) * 1000)
  return shifted.toISOString().slice(0, 19).replace('T', ' ')
}

/** Format a civil date as 'YYYY-MM-DD' */
export function formatDate(localDate: Date): string {
  return localDate.toISOString().slice(0, 10)
}

/** Format a UTC offset in hours as '+05:30' */
export function formatOffset(timezoneOffset: number): string {
  const sign = timezoneOffset < 0 ? '-' : '+'
  const totalMinutes = Math.round(Math.abs(timezoneOffset) * 60)
  const hh = String(Math.floor(totalMinutes / 60)).padStart(2, '0')
  const mm = String(totalMinutes % 60).padStart(2, '0')
  return `${sign}${hh}:${mm}`
}
