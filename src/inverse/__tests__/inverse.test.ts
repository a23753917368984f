import { describe, expect, it } from 'vitest'
import { findBestFitTime, solveTimeForPosition } from '../index.js'
import type { ObserverLocation, StarTarget } from '../../types.js'
import { civilDayWindow, MS_PER_HOUR, MS_PER_MINUTE } from '../../time/index.js'
import { removeRefraction } from '../../observer/index.js'
import { findStar, toTarget } from '../../catalog/index.js'
import { findMeridianTransit } from '../../transit/index.js'
import { astronomyEngineProvider } from '../../provider/index.js'
import { DAY, EQUATOR, NOON, sinusoidProvider } from '../../__tests__/fixtures.js'

const STAR: StarTarget = { kind: 'star', ra: 12, dec: 0 }
const window = civilDayWindow(DAY, 0)
const provider = sinusoidProvider({ peak: NOON })

describe('solveTimeForPosition', () => {
  it('returns the morning and the evening match in time order', () => {
    const candidates = solveTimeForPosition(EQUATOR, STAR, { altitude: 30 }, window, { provider })
    expect(candidates).toHaveLength(2)
    expect(Math.abs(candidates[0].instant.getTime() - (NOON - 4 * MS_PER_HOUR))).toBeLessThanOrEqual(1000)
    expect(Math.abs(candidates[1].instant.getTime() - (NOON + 4 * MS_PER_HOUR))).toBeLessThanOrEqual(1000)
    expect(candidates[0].azimuth).toBeCloseTo(120, 1)
    expect(candidates[1].azimuth).toBeCloseTo(240, 1)
    expect(candidates[0].azimuthError).toBeNull()
    expect(candidates[0].altitudeError).toBeLessThan(0.005)
  })

  it('keeps only the candidate matching the observed azimuth', () => {
    const candidates = solveTimeForPosition(EQUATOR, STAR, { altitude: 30, azimuth: 239.9 }, window, { provider })
    expect(candidates).toHaveLength(1)
    expect(Math.abs(candidates[0].instant.getTime() - (NOON + 4 * MS_PER_HOUR))).toBeLessThanOrEqual(1000)
    expect(candidates[0].azimuthError).toBeCloseTo(0.1, 1)
  })

  it('drops every candidate outside the azimuth tolerance', () => {
    const candidates = solveTimeForPosition(EQUATOR, STAR, { altitude: 30, azimuth: 180 }, window, { provider })
    expect(candidates).toEqual([])
  })

  it('returns nothing for an altitude never reached', () => {
    expect(solveTimeForPosition(EQUATOR, STAR, { altitude: 70 }, window, { provider })).toEqual([])
  })

  it('accepts a grazing match at the daily maximum', () => {
    // Peak between grid samples, observed just above the maximum
    const peak = NOON + 5 * MS_PER_MINUTE
    const candidates = solveTimeForPosition(EQUATOR, STAR, { altitude: 60.01 }, window, {
      provider: sinusoidProvider({ peak }),
    })
    expect(candidates).toHaveLength(1)
    expect(Math.abs(candidates[0].instant.getTime() - peak)).toBeLessThanOrEqual(2000)
    expect(candidates[0].altitudeError).toBeCloseTo(0.01, 4)
  })

  it('rejects a graze farther off than the altitude tolerance', () => {
    const candidates = solveTimeForPosition(EQUATOR, STAR, { altitude: 60.01 }, window, {
      provider: sinusoidProvider({ peak: NOON + 5 * MS_PER_MINUTE }),
      altitudeTolerance: 0.005,
    })
    expect(candidates).toEqual([])
  })

  it.each([3, 7])('separates two matches inside one grid cell when the peak is %i min past noon', minutes => {
    const peak = NOON + minutes * MS_PER_MINUTE
    const starProvider = sinusoidProvider({ peak })
    const seen = peak - 1.5 * MS_PER_MINUTE
    const observed = { altitude: starProvider.altAz(EQUATOR, STAR, new Date(seen)).altitude }

    const candidates = solveTimeForPosition(EQUATOR, STAR, observed, window, { provider: starProvider })
    expect(candidates).toHaveLength(2)
    expect(Math.abs(candidates[0].instant.getTime() - seen)).toBeLessThanOrEqual(1000)
    expect(Math.abs(candidates[1].instant.getTime() - (2 * peak - seen))).toBeLessThanOrEqual(1000)
  })

  it('separates two matches inside one grid cell around the lower culmination', () => {
    const peak = NOON + 3 * MS_PER_MINUTE
    const trough = peak - 12 * MS_PER_HOUR
    const starProvider = sinusoidProvider({ peak })
    const seen = trough + 1.5 * MS_PER_MINUTE
    const observed = { altitude: starProvider.altAz(EQUATOR, STAR, new Date(seen)).altitude }
    const night = { start: new Date(NOON - 18 * MS_PER_HOUR), end: new Date(NOON - 6 * MS_PER_HOUR) }

    const candidates = solveTimeForPosition(EQUATOR, STAR, observed, night, { provider: starProvider })
    expect(candidates).toHaveLength(2)
    expect(Math.abs(candidates[0].instant.getTime() - (trough - 1.5 * MS_PER_MINUTE))).toBeLessThanOrEqual(1000)
    expect(Math.abs(candidates[1].instant.getTime() - seen)).toBeLessThanOrEqual(1000)
  })

  it('removes refraction from an observed altitude first', () => {
    const candidates = solveTimeForPosition(EQUATOR, STAR, { altitude: 30, refracted: true }, window, { provider })
    expect(candidates).toHaveLength(2)
    expect(candidates[0].altitude).toBeCloseTo(removeRefraction(30), 2)
    expect(candidates[0].altitude).toBeLessThan(29.98)
  })
})

describe('findBestFitTime', () => {
  it('finds the instant matching both altitude and azimuth', () => {
    const approx = new Date(NOON - 3 * MS_PER_HOUR)
    const fit = findBestFitTime(EQUATOR, STAR, { altitude: 30, azimuth: 120 }, approx, { provider })
    expect(Math.abs(fit.instant.getTime() - (NOON - 4 * MS_PER_HOUR))).toBeLessThanOrEqual(1000)
    expect(fit.errorDeg).toBeLessThan(0.01)
  })

  it('still answers for a position never reached, with its error', () => {
    const fit = findBestFitTime(EQUATOR, STAR, { altitude: 80, azimuth: 180 }, new Date(NOON), { provider })
    expect(Math.abs(fit.instant.getTime() - NOON)).toBeLessThanOrEqual(1000)
    expect(fit.errorDeg).toBeCloseTo(20, 3)
  })
})

describe('with astronomy-engine', () => {
  it('recovers the time a star was observed', () => {
    const ujjain: ObserverLocation = { latitude: 23.18, longitude: 75.78, altitude: 0, timezoneOffset: 5.5 }
    const spica = toTarget(findStar('spica'))
    const dayWindow = civilDayWindow(new Date('2024-01-21T00:00:00Z'), ujjain.timezoneOffset)
    const seen = new Date(findMeridianTransit(ujjain, spica, dayWindow).instant.getTime() + 3 * MS_PER_HOUR)
    const observed = astronomyEngineProvider.altAz(ujjain, spica, seen)

    const candidates = solveTimeForPosition(ujjain, spica, observed, dayWindow)
    expect(candidates).toHaveLength(1)
    expect(Math.abs(candidates[0].instant.getTime() - seen.getTime())).toBeLessThanOrEqual(2000)

    expect(solveTimeForPosition(ujjain, spica, { altitude: 80 }, dayWindow)).toEqual([])
  })
})
