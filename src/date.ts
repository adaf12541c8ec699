/**
 * Calendar Dates & Ranges
 *
 * Dates bound to a Calendar, and inclusive ranges of them. Construction
 * always checks validity; nothing here normalizes an out-of-range day.
 * All arithmetic goes through ISO day counts, so it works the same for
 * every calendar.
 */

import { type Result, Ok, Err } from './result'
import { InvalidDateError, InvalidRangeError } from './errors'
import { isoDateFromIsoDays, isoDateToIsoDays, isoValidDate } from './iso'
import type { Calendar, CalendarDate, DateRange, PlusOptions } from './calendar'
import type { CivilDate, IsoDays } from './types'

export { InvalidDateError, InvalidRangeError } from './errors'

// ============================================================================
// Construction
// ============================================================================

export function newDate(
  calendar: Calendar,
  year: number,
  month: number,
  day: number
): Result<CalendarDate, InvalidDateError> {
  if (!calendar.validDate(year, month, day)) {
    return Err(
      new InvalidDateError(`Invalid ${calendar.id} date: year ${year}, month ${month}, day ${day}`)
    )
  }
  return Ok({ calendar, year, month, day })
}

export function fromIsoDays(calendar: Calendar, days: IsoDays): CalendarDate {
  const { year, month, day } = calendar.dateFromIsoDays(days)
  return { calendar, year, month, day }
}

/** Builds a date from proleptic Gregorian fields. */
export function fromIsoDate(calendar: Calendar, iso: CivilDate): Result<CalendarDate, InvalidDateError> {
  if (!isoValidDate(iso.year, iso.month, iso.day)) {
    return Err(
      new InvalidDateError(`Invalid ISO date: year ${iso.year}, month ${iso.month}, day ${iso.day}`)
    )
  }
  return Ok(fromIsoDays(calendar, isoDateToIsoDays(iso.year, iso.month, iso.day)))
}

// ============================================================================
// Conversion
// ============================================================================

export function toIsoDays(date: CalendarDate): IsoDays {
  return date.calendar.dateToIsoDays(date.year, date.month, date.day)
}

export function toIsoDate(date: CalendarDate): CivilDate {
  return isoDateFromIsoDays(toIsoDays(date))
}

export function convertDate(date: CalendarDate, calendar: Calendar): CalendarDate {
  return fromIsoDays(calendar, toIsoDays(date))
}

export function formatDate(date: CalendarDate): string {
  return date.calendar.dateToString(date.year, date.month, date.day)
}

// ============================================================================
// Arithmetic & Comparison
// ============================================================================

export function addDays(date: CalendarDate, n: number): CalendarDate {
  return fromIsoDays(date.calendar, toIsoDays(date) + n)
}

/**
 * Adds months with the calendar's own rollover rules. Without `coerce` a day
 * that does not exist in the target month is an error, not a clamp.
 */
export function addMonths(
  date: CalendarDate,
  n: number,
  options: PlusOptions = {}
): Result<CalendarDate, InvalidDateError> {
  const { year, month, day } = date.calendar.plus(date.year, date.month, date.day, 'months', n, options)
  return newDate(date.calendar, year, month, day)
}

export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return toIsoDays(b) - toIsoDays(a)
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  const diff = daysBetween(b, a)
  if (diff < 0) return -1
  if (diff > 0) return 1
  return 0
}

// ============================================================================
// Ranges
// ============================================================================

export function dateRange(first: CalendarDate, last: CalendarDate): Result<DateRange, InvalidRangeError> {
  if (first.calendar.id !== last.calendar.id) {
    return Err(
      new InvalidRangeError(`Range endpoints use different calendars: ${first.calendar.id}, ${last.calendar.id}`)
    )
  }
  if (compareDates(first, last) > 0) {
    return Err(new InvalidRangeError(`Range start ${formatDate(first)} is after end ${formatDate(last)}`))
  }
  return Ok({ first, last })
}

export function rangeSize(range: DateRange): number {
  return daysBetween(range.first, range.last) + 1
}

export function rangeContains(range: DateRange, date: CalendarDate): boolean {
  const days = toIsoDays(date)
  return days >= toIsoDays(range.first) && days <= toIsoDays(range.last)
}

export function* rangeDates(range: DateRange): Generator<CalendarDate> {
  const start = toIsoDays(range.first)
  const end = toIsoDays(range.last)
  for (let days = start; days <= end; days++) {
    yield fromIsoDays(range.first.calendar, days)
  }
}
