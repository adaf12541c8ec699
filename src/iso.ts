/**
 * ISO Utilities
 *
 * Calendar-agnostic helpers shared by every calendar: proleptic Gregorian
 * day counts, time-of-day fractions, and ISO 8601 style string parsing and
 * formatting. Uses Julian Day Number arithmetic for the Gregorian conversion.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'
import type {
  CivilDate,
  DayFraction,
  IsoDays,
  NaiveDateTime,
  TimeOfDay,
} from './types'

export { ParseError } from './errors'

// ============================================================================
// Constants
// ============================================================================

/** JDN of the proleptic Gregorian 0000-01-01, i.e. ISO day 0 */
const JDN_OF_ISO_DAY_ZERO = 1721060

export const MICROSECONDS_PER_DAY = 86_400_000_000

// ============================================================================
// Helpers
// ============================================================================

export function isIsoLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function isoDaysInMonth(year: number, month: number): number {
  const days = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isIsoLeapYear(year)) return 29
  return days[month - 1] ?? 0
}

export function isoValidDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= isoDaysInMonth(year, month)
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 0) return '-' + pad4(-n)
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function pad6(n: number): string {
  return ('' + n).padStart(6, '0')
}

// ============================================================================
// Gregorian Day Counts (via JDN)
// ============================================================================

export function isoDateToIsoDays(year: number, month: number, day: number): IsoDays {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  const jdn =
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  return jdn - JDN_OF_ISO_DAY_ZERO
}

export function isoDateFromIsoDays(days: IsoDays): CivilDate {
  const a = days + JDN_OF_ISO_DAY_ZERO + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Time of Day
// ============================================================================

export function validTime(hour: number, minute: number, second: number, microsecond: number): boolean {
  return (
    Number.isInteger(hour) && hour >= 0 && hour <= 23 &&
    Number.isInteger(minute) && minute >= 0 && minute <= 59 &&
    Number.isInteger(second) && second >= 0 && second <= 59 &&
    Number.isInteger(microsecond) && microsecond >= 0 && microsecond < 1_000_000
  )
}

export function timeToDayFraction(
  hour: number,
  minute: number,
  second: number,
  microsecond: number
): DayFraction {
  const numerator = ((hour * 60 + minute) * 60 + second) * 1_000_000 + microsecond
  return { numerator, denominator: MICROSECONDS_PER_DAY }
}

export function timeFromDayFraction(fraction: DayFraction): TimeOfDay {
  // Exact for any denominator; the product overflows float precision otherwise
  const total =
    fraction.denominator === MICROSECONDS_PER_DAY
      ? fraction.numerator
      : Number(
          (BigInt(fraction.numerator) * BigInt(MICROSECONDS_PER_DAY)) / BigInt(fraction.denominator)
        )

  const microsecond = total % 1_000_000
  const totalSeconds = Math.floor(total / 1_000_000)
  return {
    hour: Math.floor(totalSeconds / 3600),
    minute: Math.floor(totalSeconds / 60) % 60,
    second: totalSeconds % 60,
    microsecond,
  }
}

/** Days roll over at midnight UTC. */
export function dayRolloverRelativeToMidnightUtc(): DayFraction {
  return { numerator: 0, denominator: 1 }
}

// ============================================================================
// Formatting
// ============================================================================

export function dateToString(year: number, month: number, day: number): string {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}`
}

export function timeToString(hour: number, minute: number, second: number, microsecond: number): string {
  const base = `${pad2(hour)}:${pad2(minute)}:${pad2(second)}`
  return microsecond === 0 ? base : `${base}.${pad6(microsecond)}`
}

export function naiveDateTimeToString(dt: NaiveDateTime): string {
  return (
    dateToString(dt.year, dt.month, dt.day) +
    'T' +
    timeToString(dt.hour, dt.minute, dt.second, dt.microsecond)
  )
}

// ============================================================================
// Parsing (structural only; calendars check their own validity)
// ============================================================================

export function parseDateFields(str: string): Result<CivilDate, ParseError> {
  const match = /^(-?)(\d{4,})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const [, sign, yearDigits = '', monthDigits = '', dayDigits = ''] = match
  const magnitude = parseInt(yearDigits, 10)
  const year = sign === '-' && magnitude !== 0 ? -magnitude : magnitude
  const month = parseInt(monthDigits, 10)
  const day = parseInt(dayDigits, 10)

  if (month < 1) return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1) return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok({ year, month, day })
}

export function parseTime(str: string): Result<TimeOfDay, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const [, hourDigits = '', minuteDigits = '', secondDigits, fractionDigits] = match
  const hour = parseInt(hourDigits, 10)
  const minute = parseInt(minuteDigits, 10)
  const second = secondDigits ? parseInt(secondDigits, 10) : 0
  const microsecond = fractionDigits ? parseInt(fractionDigits.padEnd(6, '0'), 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok({ hour, minute, second, microsecond })
}

export function parseNaiveDateTimeFields(str: string): Result<NaiveDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDateFields(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok({ ...dateResult.value, ...timeResult.value })
}
