/**
 * Ethiopic Calendar
 *
 * Thirteen months: twelve of 30 days followed by a short month of 5 days,
 * or 6 in a leap year. Every fourth year is a leap year, the one before the
 * year divisible by four. Year 1, month 1, day 1 is the Julian date
 * 8-08-29.
 *
 * The calendar is month based only; week and quarter queries return a
 * NotDefinedError. Time of day and string handling are delegated to the
 * ISO utilities.
 */

import { type Result, Ok, Err } from './result'
import { InvalidDateError, NotDefinedError, type ParseError } from './errors'
import { amod, divAmod, floorDiv, floorMod } from './math'
import { julianDateToIsoDays } from './julian'
import { newDate } from './date'
import * as iso from './iso'
import type {
  Calendar,
  CalendarBase,
  CalendarId,
  DatePart,
  DateRange,
  PlusOptions,
  WeekOfMonth,
} from './calendar'
import type {
  CivilDate,
  DayOfEra,
  IsoDays,
  IsoDaysWithFraction,
  NaiveDateTime,
  YearOfEra,
} from './types'

export { InvalidDateError, NotDefinedError } from './errors'

// ============================================================================
// Constants
// ============================================================================

const MONTHS_IN_YEAR = 13
const DAYS_IN_WEEK = 7
const DAYS_IN_LONG_MONTH = 30

/** ISO day 0 (0000-01-01) is a Saturday */
const EPOCH_DAY_OF_WEEK = 6

const EPOCH: IsoDays = julianDateToIsoDays(8, 8, 29)

export function cldrCalendarType(): CalendarId {
  return 'ethiopic'
}

export function calendarBase(): CalendarBase {
  return 'month'
}

/** ISO day count of 0001-01-01 in this calendar. */
export function epoch(): IsoDays {
  return EPOCH
}

// ============================================================================
// Leap Rule & Validity
// ============================================================================

export function isLeapYear(year: number): boolean {
  return floorMod(year, 4) === 3
}

export function validDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month >= 1 && month <= 12) return day >= 1 && day <= DAYS_IN_LONG_MONTH
  if (month === MONTHS_IN_YEAR) {
    if (day === 6) return isLeapYear(year)
    return day >= 1 && day <= 5
  }
  return false
}

// ============================================================================
// Lengths
// ============================================================================

/** @throws InvalidDateError for a month outside 1..13 */
export function daysInMonth(year: number, month: number): number {
  if (month === MONTHS_IN_YEAR) return isLeapYear(year) ? 6 : 5
  if (Number.isInteger(month) && month >= 1 && month < MONTHS_IN_YEAR) return DAYS_IN_LONG_MONTH
  throw new InvalidDateError(`Invalid ethiopic month: ${month}`)
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function monthsInYear(_year: number): number {
  return MONTHS_IN_YEAR
}

/** Periods are months in a month-based calendar. */
export function periodsInYear(_year: number): number {
  return MONTHS_IN_YEAR
}

export function daysInWeek(): number {
  return DAYS_IN_WEEK
}

// ============================================================================
// Day Counts
// ============================================================================

export function dateToIsoDays(year: number, month: number, day: number): IsoDays {
  return EPOCH - 1 + 365 * (year - 1) + floorDiv(year, 4) + DAYS_IN_LONG_MONTH * (month - 1) + day
}

export function dateFromIsoDays(days: IsoDays): CivilDate {
  const year = floorDiv(4 * (days - EPOCH) + 1463, 1461)
  const month = floorDiv(days - dateToIsoDays(year, 1, 1), DAYS_IN_LONG_MONTH) + 1
  const day = days + 1 - dateToIsoDays(year, month, 1)
  return { year, month, day }
}

export function naiveDateTimeToIsoDays(dt: NaiveDateTime): IsoDaysWithFraction {
  return {
    days: dateToIsoDays(dt.year, dt.month, dt.day),
    fraction: iso.timeToDayFraction(dt.hour, dt.minute, dt.second, dt.microsecond),
  }
}

export function naiveDateTimeFromIsoDays(isoDays: IsoDaysWithFraction): NaiveDateTime {
  return {
    ...dateFromIsoDays(isoDays.days),
    ...iso.timeFromDayFraction(isoDays.fraction),
  }
}

// ============================================================================
// Field Accessors
// ============================================================================

/** 1 is Monday, 7 is Sunday. */
export function dayOfWeek(year: number, month: number, day: number): number {
  const days = dateToIsoDays(year, month, day)
  return amod(floorMod(days, DAYS_IN_WEEK) + EPOCH_DAY_OF_WEEK, DAYS_IN_WEEK)
}

export function dayOfYear(year: number, month: number, day: number): number {
  return dateToIsoDays(year, month, day) - dateToIsoDays(year, 1, 1) + 1
}

/** @throws InvalidDateError for year 0, which belongs to no era */
export function yearOfEra(year: number): YearOfEra {
  if (year > 0) return { year, era: 1 }
  if (year < 0) return { year: -year, era: 0 }
  throw new InvalidDateError('Ethiopic year 0 belongs to no era')
}

/** @throws InvalidDateError for year 0 */
export function dayOfEra(year: number, month: number, day: number): DayOfEra {
  const { era } = yearOfEra(year)
  return { day: dateToIsoDays(year, month, day) + EPOCH, era }
}

export function monthOfYear(_year: number, month: number, _day: number): number {
  return month
}

function notDefined(concept: string): Result<never, NotDefinedError> {
  return Err(new NotDefinedError(`The ethiopic calendar does not define ${concept}`))
}

export function quarterOfYear(_year: number, _month: number, _day: number): Result<number, NotDefinedError> {
  return notDefined('quarters')
}

export function weekOfYear(_year: number, _month: number, _day: number): Result<number, NotDefinedError> {
  return notDefined('weeks of the year')
}

export function isoWeekOfYear(_year: number, _month: number, _day: number): Result<number, NotDefinedError> {
  return notDefined('ISO weeks')
}

export function weekOfMonth(_year: number, _month: number, _day: number): Result<WeekOfMonth, NotDefinedError> {
  return notDefined('weeks of the month')
}

export function weeksInYear(_year: number): Result<number, NotDefinedError> {
  return notDefined('weeks of the year')
}

// ============================================================================
// Ranges
// ============================================================================

function rangeWithinYear(
  year: number,
  firstMonth: number,
  lastMonth: number
): Result<DateRange, InvalidDateError> {
  const first = newDate(ethiopic, year, firstMonth, 1)
  if (!first.ok) return first

  const last = newDate(ethiopic, year, lastMonth, daysInMonth(year, lastMonth))
  if (!last.ok) return last

  return Ok({ first: first.value, last: last.value })
}

export function yearRange(year: number): Result<DateRange, InvalidDateError> {
  return rangeWithinYear(year, 1, monthsInYear(year))
}

export function monthRange(year: number, month: number): Result<DateRange, InvalidDateError> {
  return rangeWithinYear(year, month, month)
}

export function quarterRange(_year: number, _quarter: number): Result<DateRange, NotDefinedError> {
  return notDefined('quarters')
}

export function weekRange(_year: number, _week: number): Result<DateRange, NotDefinedError> {
  return notDefined('weeks')
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Adds `increment` months, rolling over as many years as needed in either
 * direction. The day is carried over unchanged, so the result can be invalid
 * (day 6 of month 13 in a common year) unless `coerce` clamps it.
 */
export function plus(
  year: number,
  month: number,
  day: number,
  _datePart: DatePart,
  increment: number,
  options: PlusOptions = {}
): CivilDate {
  const [yearIncrement, newMonth] = divAmod(month + increment, MONTHS_IN_YEAR)
  const newYear = year + yearIncrement
  const newDay = options.coerce ? Math.min(day, daysInMonth(newYear, newMonth)) : day
  return { year: newYear, month: newMonth, day: newDay }
}

// ============================================================================
// Strings
// ============================================================================

export function parseDate(str: string): Result<CivilDate, ParseError | InvalidDateError> {
  const parsed = iso.parseDateFields(str)
  if (!parsed.ok) return parsed

  const { year, month, day } = parsed.value
  if (!validDate(year, month, day)) return Err(new InvalidDateError(`Invalid ethiopic date: '${str}'`))
  return parsed
}

export function parseNaiveDateTime(str: string): Result<NaiveDateTime, ParseError | InvalidDateError> {
  const parsed = iso.parseNaiveDateTimeFields(str)
  if (!parsed.ok) return parsed

  const { year, month, day } = parsed.value
  if (!validDate(year, month, day)) return Err(new InvalidDateError(`Invalid ethiopic datetime: '${str}'`))
  return parsed
}

// ============================================================================
// Calendar
// ============================================================================

export const ethiopic: Calendar = {
  id: 'ethiopic',
  cldrCalendarType,
  calendarBase,
  epoch,
  validDate,
  isLeapYear,
  daysInMonth,
  daysInYear,
  monthsInYear,
  periodsInYear,
  daysInWeek,
  dayOfWeek,
  dayOfYear,
  dayOfEra,
  yearOfEra,
  monthOfYear,
  quarterOfYear,
  weekOfYear,
  isoWeekOfYear,
  weekOfMonth,
  weeksInYear,
  yearRange,
  quarterRange,
  monthRange,
  weekRange,
  plus,
  dateToIsoDays,
  dateFromIsoDays,
  naiveDateTimeToIsoDays,
  naiveDateTimeFromIsoDays,
  dayRolloverRelativeToMidnightUtc: iso.dayRolloverRelativeToMidnightUtc,
  validTime: iso.validTime,
  dateToString: iso.dateToString,
  timeToString: iso.timeToString,
  naiveDateTimeToString: iso.naiveDateTimeToString,
  parseDate,
  parseTime: iso.parseTime,
  parseNaiveDateTime,
}
