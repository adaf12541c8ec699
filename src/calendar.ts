/**
 * Calendar contract
 *
 * The operation set every calendar implementation provides, so that callers
 * can treat calendars uniformly. Implementations are plain objects satisfying
 * this interface and are looked up by id in the registry.
 */

import type { Result } from './result'
import type { InvalidDateError, NotDefinedError, ParseError } from './errors'
import type {
  CivilDate,
  DayFraction,
  DayOfEra,
  IsoDays,
  IsoDaysWithFraction,
  NaiveDateTime,
  TimeOfDay,
  YearOfEra,
} from './types'

// ============================================================================
// Types
// ============================================================================

export type CalendarId = 'ethiopic'

/** Whether a calendar's periods are months or weeks */
export type CalendarBase = 'month' | 'week'

/** Units accepted by `plus`. Month-based calendars add months only. */
export type DatePart = 'months'

export interface PlusOptions {
  /** Clamp the day to the length of the target month */
  coerce?: boolean
}

/** A civil date bound to the calendar it is expressed in. */
export interface CalendarDate extends CivilDate {
  readonly calendar: Calendar
}

/** Inclusive range of dates in one calendar. */
export interface DateRange {
  readonly first: CalendarDate
  readonly last: CalendarDate
}

export interface WeekOfMonth {
  readonly week: number
  readonly dayOfWeek: number
}

// ============================================================================
// Contract
// ============================================================================

export interface Calendar {
  readonly id: CalendarId

  cldrCalendarType(): CalendarId
  calendarBase(): CalendarBase
  epoch(): IsoDays

  // Validity and lengths
  validDate(year: number, month: number, day: number): boolean
  isLeapYear(year: number): boolean
  daysInMonth(year: number, month: number): number
  daysInYear(year: number): number
  monthsInYear(year: number): number
  periodsInYear(year: number): number
  daysInWeek(): number

  // Field accessors
  dayOfWeek(year: number, month: number, day: number): number
  dayOfYear(year: number, month: number, day: number): number
  dayOfEra(year: number, month: number, day: number): DayOfEra
  yearOfEra(year: number): YearOfEra
  monthOfYear(year: number, month: number, day: number): number
  quarterOfYear(year: number, month: number, day: number): Result<number, NotDefinedError>
  weekOfYear(year: number, month: number, day: number): Result<number, NotDefinedError>
  isoWeekOfYear(year: number, month: number, day: number): Result<number, NotDefinedError>
  weekOfMonth(year: number, month: number, day: number): Result<WeekOfMonth, NotDefinedError>
  weeksInYear(year: number): Result<number, NotDefinedError>

  // Ranges
  yearRange(year: number): Result<DateRange, InvalidDateError>
  quarterRange(year: number, quarter: number): Result<DateRange, NotDefinedError>
  monthRange(year: number, month: number): Result<DateRange, InvalidDateError>
  weekRange(year: number, week: number): Result<DateRange, NotDefinedError>

  // Arithmetic
  plus(
    year: number,
    month: number,
    day: number,
    datePart: DatePart,
    increment: number,
    options?: PlusOptions
  ): CivilDate

  // Day counts
  dateToIsoDays(year: number, month: number, day: number): IsoDays
  dateFromIsoDays(days: IsoDays): CivilDate
  naiveDateTimeToIsoDays(dt: NaiveDateTime): IsoDaysWithFraction
  naiveDateTimeFromIsoDays(isoDays: IsoDaysWithFraction): NaiveDateTime
  dayRolloverRelativeToMidnightUtc(): DayFraction

  // Strings and time of day
  validTime(hour: number, minute: number, second: number, microsecond: number): boolean
  dateToString(year: number, month: number, day: number): string
  timeToString(hour: number, minute: number, second: number, microsecond: number): string
  naiveDateTimeToString(dt: NaiveDateTime): string
  parseDate(str: string): Result<CivilDate, ParseError | InvalidDateError>
  parseTime(str: string): Result<TimeOfDay, ParseError>
  parseNaiveDateTime(str: string): Result<NaiveDateTime, ParseError | InvalidDateError>
}
