import { describe, expect, it } from 'vitest'
import { findMeridianTransit, findTimeForSiderealTime, hourAngle } from '../index.js'
import { SUN } from '../../types.js'
import type { ObserverLocation, StarTarget } from '../../types.js'
import { InvalidInputError } from '../../errors/index.js'
import { civilDayWindow, MS_PER_HOUR, MS_PER_MINUTE } from '../../time/index.js'
import { azimuthDistance } from '../../math/index.js'
import { findStar, toTarget } from '../../catalog/index.js'
import { DAY, EQUATOR, NOON, rampProvider, sinusoidProvider } from '../../__tests__/fixtures.js'

const STAR: StarTarget = { kind: 'star', ra: 6, dec: 10 }
/** Off the 10-minute grid */
const PEAK = NOON + 23 * MS_PER_MINUTE + 17_000

describe('findMeridianTransit', () => {
  const window = civilDayWindow(DAY, 0)

  it.each(['ternary', 'golden'] as const)('finds the altitude maximum by %s search', method => {
    const result = findMeridianTransit(EQUATOR, STAR, window, { provider: sinusoidProvider({ peak: PEAK }), method })
    expect(Math.abs(result.instant.getTime() - PEAK)).toBeLessThanOrEqual(1000)
    expect(result.altitude).toBeCloseTo(60, 6)
    expect(result.azimuth).toBeCloseTo(180, 1)
    expect(result.atWindowEdge).toBe(false)
  })

  it('never returns less than the best coarse sample', () => {
    const provider = sinusoidProvider({ peak: PEAK })
    const result = findMeridianTransit(EQUATOR, STAR, window, { provider })
    const gridBest = provider.altAz(EQUATOR, STAR, new Date(NOON + 20 * MS_PER_MINUTE)).altitude
    expect(result.altitude).toBeGreaterThanOrEqual(gridBest)
  })

  it('flags a maximum that sits on the window edge', () => {
    const provider = rampProvider(window.start.getTime(), -60, 5)
    const result = findMeridianTransit(EQUATOR, STAR, window, { provider })
    expect(result.instant.getTime()).toBe(window.end.getTime())
    expect(result.atWindowEdge).toBe(true)
  })

  it('rejects the Sun', () => {
    expect(() => findMeridianTransit(EQUATOR, SUN, window, { provider: sinusoidProvider({ peak: PEAK }) })).toThrow(
      InvalidInputError,
    )
  })
})

describe('hourAngle', () => {
  it('wraps LST − RA into [−12, 12)', () => {
    expect(hourAngle(1, 23)).toBe(2)
    expect(hourAngle(23, 1)).toBe(-2)
    expect(hourAngle(13.5, 13.5)).toBe(0)
  })
})

describe('findTimeForSiderealTime', () => {
  it('solves LST(t) = target near the estimate', () => {
    // Sidereal time here is 0 h at the peak and runs 24 h a day
    const provider = sinusoidProvider({ peak: NOON })
    const t = findTimeForSiderealTime(EQUATOR, 6, new Date(NOON + 5 * MS_PER_HOUR), { provider })
    expect(Math.abs(t.getTime() - (NOON + 6 * MS_PER_HOUR))).toBeLessThanOrEqual(1000)
  })

  it('crosses the 0 h / 24 h seam', () => {
    const provider = sinusoidProvider({ peak: NOON })
    const t = findTimeForSiderealTime(EQUATOR, 23.5, new Date(NOON + MS_PER_HOUR), { provider })
    expect(Math.abs(t.getTime() - (NOON - 30 * MS_PER_MINUTE))).toBeLessThanOrEqual(1000)
  })
})

describe('with astronomy-engine', () => {
  const ujjain: ObserverLocation = { latitude: 23.18, longitude: 75.78, altitude: 0, timezoneOffset: 5.5 }
  const spica = toTarget(findStar('spica'))
  const date = new Date('2024-01-21T00:00:00Z')

  it('culminates Spica due south at 90° − φ + δ', () => {
    const transit = findMeridianTransit(ujjain, spica, civilDayWindow(date, ujjain.timezoneOffset))
    expect(transit.atWindowEdge).toBe(false)
    expect(Math.abs(transit.altitude - 55.6)).toBeLessThan(0.5)
    expect(azimuthDistance(transit.azimuth, 180)).toBeLessThan(0.5)
  })

  it('agrees with the sidereal-time route within a few minutes', () => {
    const transit = findMeridianTransit(ujjain, spica, civilDayWindow(date, ujjain.timezoneOffset))
    const bySidereal = findTimeForSiderealTime(ujjain, spica.ra, transit.instant)
    expect(Math.abs(bySidereal.getTime() - transit.instant.getTime())).toBeLessThan(3 * MS_PER_MINUTE)
  })
})
