import { describe, expect, it } from 'vitest'
import { computeStarPositions, getLocalSiderealTime } from '../index.js'
import { STAR_CATALOG, REFERENCE_STAR_NAME } from '../../catalog/index.js'
import { altAzToUnitVector } from '../../observer/index.js'
import { astronomyEngineProvider } from '../../provider/index.js'
import { EQUATOR, NOON, catalogEchoProvider } from '../../__tests__/fixtures.js'

const instant = new Date(NOON)

describe('computeStarPositions', () => {
  const positions = computeStarPositions(EQUATOR, instant, STAR_CATALOG, { provider: catalogEchoProvider(14) })
  const spica = positions.find(p => p.name === REFERENCE_STAR_NAME)

  it('places every catalog star', () => {
    expect(positions).toHaveLength(STAR_CATALOG.length)
  })

  it('wraps azimuth, derives hour angle and the ENU vector', () => {
    expect(spica).toBeDefined()
    if (!spica) return
    expect(spica.altitude).toBe(-11.161319)
    expect(spica.azimuth).toBeCloseTo(241.298335, 9)
    expect(spica.visible).toBe(false)
    expect(spica.hourAngle).toBeCloseTo(0.580111, 9)
    expect(spica.enu).toEqual(altAzToUnitVector(spica.altitude, spica.azimuth))
  })

  it('marks stars above the horizon as visible', () => {
    expect(positions.filter(p => p.visible).map(p => p.name)).toEqual([
      'Svātī (Arcturus)',
      'Abhijit (Vega)',
      'Brahmaṛṣi (Capella)',
      'Bhādrapadā (Procyon)',
      'Ārdrā (Betelgeuse)',
      'Rohiṇī (Aldebaran)',
      'Dhruva (Polaris)',
    ])
  })
})

describe('getLocalSiderealTime', () => {
  it('reads the provider', () => {
    expect(getLocalSiderealTime(EQUATOR, instant, { provider: catalogEchoProvider(14) })).toBe(14)
  })

  it('advances about four minutes a day faster than the clock with astronomy-engine', () => {
    const a = getLocalSiderealTime(EQUATOR, instant)
    const b = getLocalSiderealTime(EQUATOR, new Date(NOON + 86_400_000))
    expect(a).toBeGreaterThanOrEqual(0)
    expect(a).toBeLessThan(24)
    const gainMinutes = (((b - a) % 24) + 24) % 24 * 60
    expect(gainMinutes).toBeCloseTo(3.94, 1)
  })
})

describe('astronomy-engine positions', () => {
  it('keeps Polaris within a degree of the latitude', () => {
    const location = { latitude: 23, longitude: 77, altitude: 0, timezoneOffset: 5.5 }
    const [polaris] = computeStarPositions(location, instant, STAR_CATALOG.filter(s => s.name.includes('Polaris')), {
      provider: astronomyEngineProvider,
    })
    expect(Math.abs(polaris.altitude - 23)).toBeLessThan(1)
    expect(polaris.visible).toBe(true)
  })
})
