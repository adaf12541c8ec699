/**
 * Calendar engine
 *
 * Public API exports
 */

// Error system
export {
  CalendarError, CalendarErrorCode,
  NotDefinedError, InvalidDateError, InvalidRangeError,
  ParseError, UnknownCalendarError,
} from './errors'
export type { CalendarErrorCode as CalendarErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Shared value types
export type {
  IsoDays, CivilDate, TimeOfDay, NaiveDateTime,
  DayFraction, IsoDaysWithFraction, Era, YearOfEra, DayOfEra,
} from './types'

// Calendar contract
export type {
  Calendar, CalendarId, CalendarBase, DatePart, PlusOptions,
  CalendarDate, DateRange, WeekOfMonth,
} from './calendar'

// Calendars
export { ethiopic } from './ethiopic'
export { getCalendar, calendarIds, isCalendarId } from './registry'

// Calendar-bound dates and ranges
export {
  newDate, fromIsoDays, fromIsoDate, toIsoDays, toIsoDate, convertDate, formatDate,
  addDays, addMonths, daysBetween, compareDates,
  dateRange, rangeSize, rangeContains, rangeDates,
} from './date'

// ISO utilities (calendar-agnostic)
export {
  MICROSECONDS_PER_DAY,
  isIsoLeapYear, isoDaysInMonth, isoValidDate,
  isoDateToIsoDays, isoDateFromIsoDays,
  validTime, timeToDayFraction, timeFromDayFraction, dayRolloverRelativeToMidnightUtc,
  dateToString, timeToString, naiveDateTimeToString,
  parseDateFields, parseTime, parseNaiveDateTimeFields,
} from './iso'

// Julian anchor
export { isJulianLeapYear, julianDateToIsoDays } from './julian'

// Floor arithmetic
export { floorDiv, floorMod, amod, divAmod } from './math'
