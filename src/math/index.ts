/**
 * math — Core numerical utilities.
 *
 * All computation in this module is pure (no I/O, no state). The solvers work
 * on plain numbers (milliseconds since the Unix epoch); Dates only appear at
 * the module boundaries above this one.
 *
 * Method choice:
 *   - sign-change problems (altitude crosses a threshold) → bisection
 *   - unimodal maximization (altitude peaks at transit)   → ternary or golden-section
 */

import type { MaximizeMethod } from '../types.js'

// ─── Root finding ─────────────────────────────────────────────────────────────

export interface IterationLimits {
  /** Stop once the bracket is narrower than this (same units as the domain) */
  tolerance: number
  /** Hard cap on the number of halvings / shrink steps */
  maxIterations: number
}

/**
 * Find a root of f(t) in [a, b] by bisection.
 * Requires f(a) and f(b) to have opposite signs (either may be exactly zero).
 *
 * Each step keeps the half whose endpoints still differ in sign. Stops when the
 * bracket is narrower than the tolerance or the iteration cap is reached, and
 * returns the midpoint of the final bracket.
 *
 * @returns Root location, or null if [a, b] does not bracket a sign change
 */
export function bisect(
  f: (t: number) => number,
  a: number,
  b: number,
  { tolerance, maxIterations }: IterationLimits,
): number | null {
  let fa = f(a)
  const fb = f(b)

  if (fa * fb > 0) return null
  if (fa === 0) return a
  if (fb === 0) return b

  for (let i = 0; i < maxIterations && Math.abs(b - a) >= tolerance; i++) {
    const mid = (a + b) / 2
    const fm = f(mid)
    if (fa * fm <= 0) {
      b = mid
    } else {
      a = mid
      fa = fm
    }
  }

  return (a + b) / 2
}

// ─── Unimodal optimization ───────────────────────────────────────────────────

/**
 * Ternary search for the maximum of a unimodal f on [a, b].
 * Each step compares f at the two interior third-points and discards the
 * outer third that cannot contain the maximum.
 */
export function ternaryMax(
  f: (t: number) => number,
  a: number,
  b: number,
  { tolerance, maxIterations }: IterationLimits,
): number {
  for (let i = 0; i < maxIterations && b - a > tolerance; i++) {
    const m1 = a + (b - a) / 3
    const m2 = b - (b - a) / 3
    if (f(m1) < f(m2)) {
      a = m1
    } else {
      b = m2
    }
  }
  return (a + b) / 2
}

/** 1/φ, the golden-section shrink factor */
const INV_PHI = (Math.sqrt(5) - 1) / 2

/**
 * Golden-section search for the maximum of a unimodal f on [a, b].
 * Reuses one interior evaluation per step, so it needs ~40% fewer
 * evaluations than ternary search for the same tolerance.
 */
export function goldenSectionMax(
  f: (t: number) => number,
  a: number,
  b: number,
  { tolerance, maxIterations }: IterationLimits,
): number {
  let x1 = b - INV_PHI * (b - a)
  let x2 = a + INV_PHI * (b - a)
  let f1 = f(x1)
  let f2 = f(x2)

  for (let i = 0; i < maxIterations && b - a > tolerance; i++) {
    if (f1 < f2) {
      a = x1
      x1 = x2
      f1 = f2
      x2 = a + INV_PHI * (b - a)
      f2 = f(x2)
    } else {
      b = x2
      x2 = x1
      f2 = f1
      x1 = b - INV_PHI * (b - a)
      f1 = f(x1)
    }
  }
  return (a + b) / 2
}

/** Maximize a unimodal f on [a, b] with the chosen method */
export function maximize(
  f: (t: number) => number,
  a: number,
  b: number,
  limits: IterationLimits,
  method: MaximizeMethod = 'ternary',
): number {
  return method === 'golden'
    ? goldenSectionMax(f, a, b, limits)
    : ternaryMax(f, a, b, limits)
}

/** Minimize a unimodal f on [a, b] with the chosen method */
export function minimize(
  f: (t: number) => number,
  a: number,
  b: number,
  limits: IterationLimits,
  method: MaximizeMethod = 'ternary',
): number {
  return maximize(t => -f(t), a, b, limits, method)
}

// ─── Grid sampling ────────────────────────────────────────────────────────────

/**
 * Evenly spaced sample points covering [a, b] with spacing at most `step`.
 * Always includes both endpoints.
 */
export function gridPoints(a: number, b: number, step: number): number[] {
  if (!(step > 0)) throw new RangeError(`Grid step must be positive, got ${step}`)
  const n = Math.max(1, Math.ceil((b - a) / step))
  const points: number[] = []
  for (let i = 0; i <= n; i++) {
    points.push(i === n ? b : a + i * step)
  }
  return points
}

/**
 * Find the index of the largest value. Ties resolve to the earliest index.
 */
export function argMax(values: readonly number[]): number {
  let best = 0
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i
  }
  return best
}

// ─── Angle utilities ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/** Convert radians to degrees */
export const RAD2DEG = 180 / Math.PI

/** Normalize an angle in degrees to [0, 360) */
export function mod360(deg: number): number {
  return ((deg % 360) + 360) % 360
}

/** Normalize an angle in degrees to [-180, 180) */
export function normalizeDeg180(deg: number): number {
  deg = mod360(deg)
  return deg >= 180 ? deg - 360 : deg
}

/** Normalize hours to [0, 24) */
export function mod24(hours: number): number {
  return ((hours % 24) + 24) % 24
}

/** Normalize hours to [-12, 12) */
export function normalizeHours12(hours: number): number {
  hours = mod24(hours)
  return hours >= 12 ? hours - 24 : hours
}

/** Smallest absolute difference between two azimuths, degrees in [0, 180] */
export function azimuthDistance(a: number, b: number): number {
  return Math.abs(normalizeDeg180(a - b))
}
