/**
 * catalog — Bright reference stars with their traditional Indian names.
 *
 * J2000 positions. Chitrā (Spica) is the default reference star: many
 * Siddhāntic texts fix the zero point of the sidereal zodiac opposite it.
 */

import type { CatalogStar, StarTarget } from '../types.js'
import { InvalidInputError } from '../errors/index.js'

export const STAR_CATALOG: readonly CatalogStar[] = [
  { name: 'Chitrā (Spica)', ra: 13.419889, dec: -11.161319, magnitude: 0.97 },
  { name: 'Lubdhaka / Mrigavyādha (Sirius)', ra: 6.752477, dec: -16.716116, magnitude: -1.46 },
  { name: 'Agastya (Canopus)', ra: 6.399192, dec: -52.695661, magnitude: -0.74 },
  { name: 'Svātī (Arcturus)', ra: 14.261208, dec: 19.182416, magnitude: -0.05 },
  { name: 'Abhijit (Vega)', ra: 18.615649, dec: 38.783691, magnitude: 0.03 },
  { name: 'Brahmaṛṣi (Capella)', ra: 5.278155, dec: 45.997991, magnitude: 0.08 },
  { name: 'Mṛgaśīrṣa (Rigel)', ra: 5.242298, dec: -8.201639, magnitude: 0.12 },
  { name: 'Bhādrapadā (Procyon)', ra: 7.655033, dec: 5.225, magnitude: 0.38 },
  { name: 'Ārdrā (Betelgeuse)', ra: 5.919529, dec: 7.407064, magnitude: 0.42 },
  { name: 'Rohiṇī (Aldebaran)', ra: 4.598677, dec: 16.509302, magnitude: 0.75 },
  { name: 'Dhruva (Polaris)', ra: 2.530301, dec: 89.264109, magnitude: 1.98 },
]

/** The default reference star */
export const REFERENCE_STAR_NAME = 'Chitrā (Spica)'

/**
 * Look a star up by any part of its name, ignoring case and diacritics:
 * 'spica', 'chitra' and 'Chitrā' all find Chitrā (Spica).
 *
 * @throws InvalidInputError when nothing matches
 */
export function findStar(query: string, catalog: readonly CatalogStar[] = STAR_CATALOG): CatalogStar {
  const needle = foldName(query)
  const star = needle ? catalog.find(s => foldName(s.name).includes(needle)) : undefined
  if (!star) {
    throw new InvalidInputError(`Unknown star: ${query}. Known stars: ${catalog.map(s => s.name).join(', ')}`)
  }
  return star
}

/** A catalog entry as a solver target */
export function toTarget(star: CatalogStar): StarTarget {
  return { kind: 'star', ra: star.ra, dec: star.dec, name: star.name, magnitude: star.magnitude }
}

/** Lower-case, strip combining marks and surrounding space */
function foldName(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase().trim()
}
