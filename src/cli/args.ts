/**
 * Argument parsing for the CLI. Bad arguments throw InvalidInputError;
 * the entry point prints the message and exits with status 1.
 */

import { parseObserverLocation } from '../config/index.js'
import { InvalidInputError } from '../errors/index.js'
import { localMeanTimeOffset } from '../observer/index.js'
import type { ObserverLocation } from '../types.js'

export interface ParsedArgs {
  positional: string[]
  /** Hours east of UTC from --tz; null means local mean time */
  tz: number | null
  visible: boolean
}

export function parseArgs(cmdArgs: string[]): ParsedArgs {
  const positional: string[] = []
  let tz: number | null = null
  let visible = false

  for (let i = 0; i < cmdArgs.length; i++) {
    const arg = cmdArgs[i]
    if (arg === '--tz') {
      tz = parseFloat(cmdArgs[++i] ?? '')
      if (isNaN(tz)) fail('--tz needs a number of hours, e.g. --tz 5.5')
    } else if (arg === '--visible') {
      visible = true
    } else {
      positional.push(arg)
    }
  }
  return { positional, tz, visible }
}

export function toLocation(
  latText: string | undefined,
  lonText: string | undefined,
  tz: number | null,
  usage: string,
): ObserverLocation {
  const latitude = parseFloat(latText ?? '')
  const longitude = parseFloat(lonText ?? '')
  if (isNaN(latitude) || isNaN(longitude)) fail(`Usage: ghatika ${usage}`)
  return parseObserverLocation({
    latitude,
    longitude,
    timezoneOffset: tz ?? localMeanTimeOffset(longitude),
  })
}

export function fail(message: string): never {
  throw new InvalidInputError(message)
}
