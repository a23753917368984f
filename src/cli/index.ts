/**
 * ghatika CLI
 *
 * Commands:
 *   ghatika sunrise <lat> <lon> [date]            Sunrise, sunset and twilight
 *   ghatika clock <lat> <lon> [datetime]          Ghaṭi / muhūrta / yāma and Panchang
 *   ghatika stars <lat> <lon> [datetime]          Star altitudes and azimuths
 *   ghatika transit <star> <lat> <lon> [date]     Meridian transit of a star
 *   ghatika solve <star> <alt> <az> <lat> <lon> [date]   Time from an observed position
 *
 * Every command takes --tz <hours east of UTC>; the default is local mean time.
 */

import {
  getSunEvents,
  getAncientClock,
  getStarPositions,
  getMeridianTransit,
  getTransitBySiderealTime,
  solveObservedTime,
} from '../api/index.js'
import { getPanchang } from '../panchang/index.js'
import { getLocalSiderealTime } from '../sky/index.js'
import { describeLocation } from '../observer/index.js'
import { formatLocal, formatOffset, localDateOf, formatDate, parseLocalDate, parseLocalDateTime } from '../time/index.js'
import type { AncientUnitCount, ObserverLocation } from '../types.js'
import { fail, parseArgs, toLocation } from './args.js'
import type { ParsedArgs } from './args.js'

const args = process.argv.slice(2)
const command = args[0]

async function main() {
  switch (command) {
    case 'sunrise':
      cmdSunrise(parseArgs(args.slice(1)))
      break
    case 'clock':
      cmdClock(parseArgs(args.slice(1)))
      break
    case 'stars':
      cmdStars(parseArgs(args.slice(1)))
      break
    case 'transit':
      cmdTransit(parseArgs(args.slice(1)))
      break
    case 'solve':
      cmdSolve(parseArgs(args.slice(1)))
      break
    case 'help':
    case '--help':
    case '-h':
      printHelp()
      break
    default:
      printHelp()
      process.exit(command ? 1 : 0)
  }
}

function printHelp() {
  console.log(`ghatika — Sky positions and the ancient Indian clock

Commands:
  sunrise <lat> <lon> [YYYY-MM-DD]                 Sunrise, sunset and twilight
  clock <lat> <lon> [YYYY-MM-DDTHH:MM]             Ghaṭi, muhūrta, yāma and Panchang (default now)
  stars <lat> <lon> [YYYY-MM-DDTHH:MM] [--visible] Star positions (default now)
  transit <star> <lat> <lon> [YYYY-MM-DD]          Meridian transit of a catalog star
  solve <star> <alt> <az> <lat> <lon> [YYYY-MM-DD] Times a star stands at an observed alt/az

Options:
  --tz <hours>    Timezone offset east of UTC (default: local mean time, lon / 15)
  --visible       stars: only list stars above the horizon

Examples:
  ghatika sunrise 23.18 75.78 2024-03-20 --tz 5.5
  ghatika clock 23.18 75.78 --tz 5.5
  ghatika transit chitra 23.18 75.78 2024-04-22 --tz 5.5
  ghatika solve spica 40 150 23.18 75.78 2024-04-22 --tz 5.5`)
}

// ─── Commands ────────────────────────────────────────────────────────────────

function cmdSunrise({ positional, tz }: ParsedArgs) {
  const [lat, lon, dateStr] = positional
  const loc = toLocation(lat, lon, tz, 'sunrise <lat> <lon> [YYYY-MM-DD] [--tz h]')
  const date = dateStr ? parseLocalDate(dateStr) : localDateOf(new Date(), loc.timezoneOffset)
  const events = getSunEvents(loc, date)

  printHeader(loc, formatDate(date))
  console.log(`Sunrise:            ${fmtLocal(events.sunrise, loc)}`)
  console.log(`Sunset:             ${fmtLocal(events.sunset, loc)}`)
  console.log(`Day length:         ${events.dayLengthMs !== null ? fmtDuration(events.dayLengthMs) : 'N/A'}`)
  console.log(`Civil dawn:         ${fmtLocal(events.civilDawn, loc)}`)
  console.log(`Civil dusk:         ${fmtLocal(events.civilDusk, loc)}`)
  console.log(`Nautical dusk:      ${fmtLocal(events.nauticalDusk, loc)}`)
  console.log(`Astronomical dusk:  ${fmtLocal(events.astronomicalDusk, loc)}`)
  if (!events.sunrise && !events.sunset) {
    console.log('')
    console.log('The Sun does not cross the horizon on this date (polar day or night).')
  }
}

function cmdClock({ positional, tz }: ParsedArgs) {
  const [lat, lon, when] = positional
  const loc = toLocation(lat, lon, tz, 'clock <lat> <lon> [YYYY-MM-DDTHH:MM] [--tz h]')
  const now = when ? parseLocalDateTime(when, loc.timezoneOffset) : new Date()
  const { sunrise, reading } = getAncientClock(loc, now)
  const panchang = getPanchang(loc, now)

  printHeader(loc, formatLocal(now, loc.timezoneOffset))
  console.log(`Sidereal time: ${fmtHours(getLocalSiderealTime(loc, now))}`)
  console.log(`Sunrise:       ${sunrise.found ? formatLocal(sunrise.instant, loc.timezoneOffset) : 'N/A'}`)
  console.log('')
  if (reading) {
    console.log(`Ghaṭi:         ${fmtUnit(reading.ghati, 60)}`)
    console.log(`Muhūrta:       ${fmtUnit(reading.muhurta, 30)}`)
    console.log(`Yāma:          ${fmtUnit(reading.yama, 8)}`)
    console.log(`Since sunrise: ${fmtDuration(reading.elapsedMs)}`)
  } else {
    console.log('No sunrise to count from (polar day or night).')
  }
  console.log('')
  console.log(`Vaar:          ${panchang.vaar} (${panchang.weekday})`)
  console.log(`Tithi:         ${panchang.tithi}  (demo)`)
  console.log(`Nakshatra:     ${panchang.nakshatra}  (demo)`)
  console.log(`Yoga:          ${panchang.yoga}  (demo)`)
  console.log(`Karana:        ${panchang.karana}  (demo)`)
}

function cmdStars({ positional, tz, visible }: ParsedArgs) {
  const [lat, lon, when] = positional
  const loc = toLocation(lat, lon, tz, 'stars <lat> <lon> [YYYY-MM-DDTHH:MM] [--tz h] [--visible]')
  const now = when ? parseLocalDateTime(when, loc.timezoneOffset) : new Date()
  const stars = getStarPositions(loc, now, { visibleOnly: visible })

  printHeader(loc, formatLocal(now, loc.timezoneOffset))
  if (stars.length === 0) {
    console.log('No catalog stars above the horizon.')
    return
  }
  console.log(`${'Star'.padEnd(26)}${'Alt'.padStart(8)}${'Az'.padStart(8)}${'HA'.padStart(8)}`)
  for (const s of stars) {
    const mark = s.visible ? '' : '  (below horizon)'
    console.log(
      `${s.name.padEnd(26)}${s.altitude.toFixed(1).padStart(7)}°${s.azimuth.toFixed(1).padStart(7)}°` +
      `${s.hourAngle.toFixed(2).padStart(7)}h${mark}`,
    )
  }
}

function cmdTransit({ positional, tz }: ParsedArgs) {
  const [star, lat, lon, dateStr] = positional
  const usage = 'transit <star> <lat> <lon> [YYYY-MM-DD] [--tz h]'
  if (!star) fail(`Usage: ghatika ${usage}`)
  const loc = toLocation(lat, lon, tz, usage)
  const date = dateStr ? parseLocalDate(dateStr) : localDateOf(new Date(), loc.timezoneOffset)

  const transit = getMeridianTransit(loc, star, date)
  const bySidereal = getTransitBySiderealTime(loc, star, transit.instant)

  printHeader(loc, formatDate(date))
  console.log(`Transit (max altitude): ${formatLocal(transit.instant, loc.timezoneOffset)}`)
  console.log(`Transit (LST = RA):     ${formatLocal(bySidereal, loc.timezoneOffset)}`)
  console.log(`Altitude:               ${transit.altitude.toFixed(2)}°`)
  console.log(`Azimuth:                ${transit.azimuth.toFixed(2)}°`)
  if (transit.atWindowEdge) {
    console.log('')
    console.log('Maximum lies at the edge of the day; the transit falls on the neighbouring date.')
  }
}

function cmdSolve({ positional, tz }: ParsedArgs) {
  const [star, altText, azText, lat, lon, dateStr] = positional
  const usage = 'solve <star> <alt> <az> <lat> <lon> [YYYY-MM-DD] [--tz h]'
  const altitude = parseFloat(altText ?? '')
  const azimuth = parseFloat(azText ?? '')
  if (!star || isNaN(altitude) || isNaN(azimuth)) fail(`Usage: ghatika ${usage}`)
  const loc = toLocation(lat, lon, tz, usage)
  const date = dateStr ? parseLocalDate(dateStr) : localDateOf(new Date(), loc.timezoneOffset)

  const candidates = solveObservedTime(loc, star, { altitude, azimuth }, date)

  printHeader(loc, formatDate(date))
  if (candidates.length === 0) {
    console.log(`${star} never stands at altitude ${altitude}°, azimuth ${azimuth}° on this date.`)
    return
  }
  for (const c of candidates) {
    console.log(
      `${formatLocal(c.instant, loc.timezoneOffset)}  alt ${c.altitude.toFixed(2)}°  az ${c.azimuth.toFixed(2)}°` +
      `  (Δaz ${(c.azimuthError ?? 0).toFixed(2)}°)`,
    )
  }
}

// ─── Formatting ──────────────────────────────────────────────────────────────

function printHeader(loc: ObserverLocation, when: string) {
  console.log(`${describeLocation(loc)}, UTC${formatOffset(loc.timezoneOffset)}, ${when}`)
  console.log('')
}

/** Format a nullable Date on the observer's clock. */
function fmtLocal(d: Date | null, loc: ObserverLocation): string {
  if (!d) return 'N/A'
  return formatLocal(d, loc.timezoneOffset)
}

function fmtUnit(count: AncientUnitCount, period: number): string {
  return `${count.value.toFixed(2)} / ${period}`
}

function fmtDuration(ms: number): string {
  const totalMinutes = Math.round(ms / 60_000)
  return `${Math.floor(totalMinutes / 60)}h ${String(totalMinutes % 60).padStart(2, '0')}m`
}

function fmtHours(hours: number): string {
  const totalSeconds = Math.round(hours * 3600)
  const h = Math.floor(totalSeconds / 3600) % 24
  const m = Math.floor((totalSeconds % 3600) / 60)
  const s = totalSeconds % 60
  return [h, m, s].map(n => String(n).padStart(2, '0')).join(':')
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
