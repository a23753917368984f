// ─── Primitive geometry ──────────────────────────────────────────────────────

/** 3-element unit vector in the local East-North-Up frame */
export type Vec3 = [number, number, number]

/** Altitude + azimuth in degrees */
export interface AltAz {
  /** Degrees above the horizon (negative = below), in [-90, 90] */
  altitude: number
  /** Degrees from North, measured clockwise (0 = N, 90 = E, 180 = S, 270 = W), in [0, 360) */
  azimuth: number
}

// ─── Observer ────────────────────────────────────────────────────────────────

/** Observer location. Supplied fresh with every computation. */
export interface ObserverLocation {
  /** Geodetic latitude in degrees (north positive) */
  latitude: number
  /** Longitude in degrees (east positive) */
  longitude: number
  /** Height above sea level in meters */
  altitude: number
  /**
   * Offset of the observer's civil clock from UTC, in hours (e.g. 5.5 for IST).
   * Civil days, and therefore the search windows, are delimited by this offset.
   */
  timezoneOffset: number
  /** Optional label for the location */
  name?: string
}

// ─── Time ────────────────────────────────────────────────────────────────────

/**
 * A bounded interval of civil time, used as the search domain by every solver.
 * Invariant: start < end.
 */
export interface TimeWindow {
  start: Date
  end: Date
}

// ─── Targets ─────────────────────────────────────────────────────────────────

/** A fixed star given by its J2000 catalog coordinates */
export interface StarTarget {
  kind: 'star'
  /** Right ascension in hours [0, 24) */
  ra: number
  /** Declination in degrees */
  dec: number
  name?: string
  /** Apparent visual magnitude */
  magnitude?: number
}

export interface SunTarget {
  kind: 'sun'
}

export type CelestialTarget = StarTarget | SunTarget

/** The Sun as a target. Its position is always computed for the instant asked. */
export const SUN: SunTarget = { kind: 'sun' }

// ─── Sunrise & events ────────────────────────────────────────────────────────

/**
 * Outcome of a sunrise search. `found: false` means the Sun never crossed the
 * threshold upward inside the window (polar day or polar night).
 */
export type SunriseResult =
  | { found: true; instant: Date }
  | { found: false; instant: null }

export interface SunEvents {
  sunrise: Date | null
  sunset: Date | null
  /** Sun rising through -6° */
  civilDawn: Date | null
  /** Sun setting through -6° */
  civilDusk: Date | null
  /** Sun setting through -12° */
  nauticalDusk: Date | null
  /** Sun setting through -18° */
  astronomicalDusk: Date | null
  /** sunset - sunrise in milliseconds, null unless both occur and sunset follows sunrise */
  dayLengthMs: number | null
}

/** Direction of a threshold crossing */
export type CrossingDirection = 'rising' | 'setting'

// ─── Transit & inverse solve ─────────────────────────────────────────────────

export interface TransitResult {
  /** Instant of maximum altitude inside the window */
  instant: Date
  /** Altitude at that instant, degrees */
  altitude: number
  /** Azimuth at that instant, degrees (≈ 0 or 180 for an interior transit) */
  azimuth: number
  /**
   * True when the maximum sits on a window boundary, i.e. the object's
   * culmination falls outside the window and altitude is still climbing
   * (or already falling) at the edge.
   */
  atWindowEdge: boolean
}

/** One instant at which the object's position matches the observed one */
export interface PositionCandidate {
  instant: Date
  altitude: number
  azimuth: number
  /** |altitude - observed altitude|, degrees */
  altitudeError: number
  /** Wrapped |azimuth - observed azimuth|, degrees; null when no azimuth was observed */
  azimuthError: number | null
}

export interface BestFitResult {
  instant: Date
  /** Combined angular error hypot(Δalt, Δaz), degrees */
  errorDeg: number
}

/** Maximization method for unimodal problems */
export type MaximizeMethod = 'ternary' | 'golden'

// ─── Ancient units ───────────────────────────────────────────────────────────

/** Number of units per day for each ancient subdivision */
export const ANCIENT_UNIT_PERIODS = {
  ghati: 60,
  muhurta: 30,
  yama: 8,
} as const

export type AncientUnit = keyof typeof ANCIENT_UNIT_PERIODS

/** A count of one ancient unit, wrapped into [0, period) */
export interface AncientUnitCount {
  /** Fractional count, e.g. 7.5 */
  value: number
  /** Completed units, e.g. 7 */
  whole: number
  /** Progress through the current unit in [0, 1), e.g. 0.5 */
  fraction: number
}

export interface AncientTimeReading {
  ghati: AncientUnitCount
  muhurta: AncientUnitCount
  yama: AncientUnitCount
  /** The sunrise the reading is counted from (may be the previous day's) */
  sunrise: Date
  /** now - sunrise, milliseconds, never negative */
  elapsedMs: number
  /** Length of the day the units divide, milliseconds */
  dayLengthMs: number
  /** elapsed / dayLength, wrapped into [0, 1) */
  dayFraction: number
}

/** How long the "day" divided into 60 ghaṭis is */
export type DayLengthMode = 'fixed' | 'sunrise-to-sunrise'

export interface AncientTimeResult {
  /** Sunrise the reading is counted from */
  sunrise: SunriseResult
  /** null when no sunrise could be found (polar conditions) */
  reading: AncientTimeReading | null
}

// ─── Sky ─────────────────────────────────────────────────────────────────────

export interface CatalogStar {
  /** Display name: traditional Sanskrit name with the Western name in parentheses */
  name: string
  /** Right ascension, hours (J2000) */
  ra: number
  /** Declination, degrees (J2000) */
  dec: number
  /** Apparent visual magnitude */
  magnitude: number
}

export interface StarPosition extends AltAz {
  name: string
  ra: number
  dec: number
  magnitude: number
  /** True when the star is above the mathematical horizon */
  visible: boolean
  /** Local hour angle in hours, [-12, 12). Negative = east of the meridian. */
  hourAngle: number
  /** Unit vector in the observer's ENU frame (x = East, y = North, z = Up) */
  enu: Vec3
}

// ─── Panchang ────────────────────────────────────────────────────────────────

export interface PanchangDetails {
  /** Local civil date, YYYY-MM-DD */
  date: string
  /** Sanskrit weekday name, e.g. 'Somavāra' */
  vaar: string
  /** English weekday name, e.g. 'Monday' */
  weekday: string
  tithi: string
  nakshatra: string
  yoga: string
  karana: string
  /** Tithi, Nakshatra, Yoga and Karana are fixed placeholders, not computed */
  demo: true
}

// ─── Snapshot ────────────────────────────────────────────────────────────────

/** Everything one refresh of the sky clock needs */
export interface SkySnapshot {
  instantUTC: Date
  location: ObserverLocation
  /** Observer's civil clock reading, 'YYYY-MM-DD HH:MM:SS' */
  localTime: string
  /** Local apparent sidereal time, hours [0, 24) */
  localSiderealTime: number
  ancient: AncientTimeResult
  stars: StarPosition[]
  panchang: PanchangDetails | null
}

// ─── Thresholds ──────────────────────────────────────────────────────────────

/**
 * Standard threshold altitude for sunrise/sunset.
 * Standard refraction at the horizon (34') + solar semi-diameter (16') = −50'.
 */
export const SUN_ALTITUDE_THRESHOLD = -0.8333

/** Twilight thresholds, degrees */
export const TWILIGHT_THRESHOLDS = {
  civil: -6,
  nautical: -12,
  astronomical: -18,
} as const
