/**
 * Julian calendar day counts.
 *
 * Only the pieces needed to anchor other calendars to a historical Julian
 * date. Julian years have no year 0: year -1 is followed by year 1.
 */

import { floorMod } from './math'
import { isoDateToIsoDays } from './iso'
import type { IsoDays } from './types'

/** Julian 0001-01-01 falls on the Gregorian 0000-12-30 */
const JULIAN_EPOCH: IsoDays = isoDateToIsoDays(0, 12, 30)

export function isJulianLeapYear(year: number): boolean {
  return floorMod(year < 0 ? year + 1 : year, 4) === 0
}

export function julianDateToIsoDays(year: number, month: number, day: number): IsoDays {
  const y = year < 0 ? year + 1 : year
  let adjustment = 0
  if (month > 2) adjustment = isJulianLeapYear(year) ? -1 : -2

  return (
    JULIAN_EPOCH - 1 +
    365 * (y - 1) +
    Math.floor((y - 1) / 4) +
    Math.floor((367 * month - 362) / 12) +
    adjustment +
    day
  )
}
