import type { ObserverLocation, SunriseResult } from '../types.js'
import type { CoordinateProvider } from '../provider/index.js'
import { mod24, mod360 } from '../math/index.js'
import { MS_PER_DAY, MS_PER_HOUR } from '../time/index.js'

export const EQUATOR: ObserverLocation = { latitude: 0, longitude: 0, altitude: 0, timezoneOffset: 0 }

/** 2024-03-20 as a civil date, and its UTC noon */
export const DAY = new Date('2024-03-20T00:00:00Z')
export const NOON = Date.UTC(2024, 2, 20, 12)

export interface SinusoidOptions {
  /** Instant of maximum altitude, ms since epoch. Repeats every 24 h. */
  peak: number
  amplitude?: number
  mean?: number
}

/**
 * Every target follows altitude = mean + amplitude·cos(2π(t − peak)/24 h).
 * Azimuth sweeps 360° a day and is 180° at the peak; sidereal time is 0 h at
 * the peak and advances 24 h a day.
 */
export function sinusoidProvider({ peak, amplitude = 60, mean = 0 }: SinusoidOptions): CoordinateProvider {
  const phase = (instant: Date) => (instant.getTime() - peak) / MS_PER_DAY
  return {
    altAz: (_location, _target, instant) => ({
      altitude: mean + amplitude * Math.cos(2 * Math.PI * phase(instant)),
      azimuth: mod360(180 + 360 * phase(instant)),
    }),
    siderealTime: (_location, instant) => mod24(24 * phase(instant)),
  }
}

/** Milliseconds between a sinusoid's threshold crossing and its peak */
export function crossingOffsetMs(threshold: number, amplitude = 60, mean = 0): number {
  return (MS_PER_DAY / (2 * Math.PI)) * Math.acos((threshold - mean) / amplitude)
}

/** Altitude rising linearly without bound: never peaks inside a window */
export function rampProvider(start: number, startAltitude: number, degreesPerHour: number): CoordinateProvider {
  return {
    altAz: (_location, _target, instant) => ({
      altitude: startAltitude + (degreesPerHour * (instant.getTime() - start)) / MS_PER_HOUR,
      azimuth: 90,
    }),
    siderealTime: () => 0,
  }
}

/**
 * Stars stand at altitude = dec and (unwrapped) azimuth = 15·ra + 400;
 * the Sun on the horizon due north. Sidereal time is constant.
 */
export function catalogEchoProvider(lst: number): CoordinateProvider {
  return {
    altAz: (_location, target) =>
      target.kind === 'star'
        ? { altitude: target.dec, azimuth: target.ra * 15 + 400 }
        : { altitude: 0, azimuth: 0 },
    siderealTime: () => lst,
  }
}

/** Delegates to `inner` until `from`, then throws */
export function failingProvider(inner: CoordinateProvider, message: string, from = -Infinity): CoordinateProvider {
  return {
    altAz(location, target, instant) {
      if (instant.getTime() >= from) throw new Error(message)
      return inner.altAz(location, target, instant)
    },
    siderealTime(location, instant) {
      if (instant.getTime() >= from) throw new Error(message)
      return inner.siderealTime(location, instant)
    },
  }
}

export function countingProvider(inner: CoordinateProvider): { provider: CoordinateProvider; calls: () => number } {
  let calls = 0
  return {
    provider: {
      altAz(location, target, instant) {
        calls++
        return inner.altAz(location, target, instant)
      },
      siderealTime: (location, instant) => inner.siderealTime(location, instant),
    },
    calls: () => calls,
  }
}

export function sunriseInstant(result: SunriseResult): Date {
  if (!result.found) throw new Error('expected a sunrise')
  return result.instant
}
