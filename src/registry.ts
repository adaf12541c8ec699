/**
 * Calendar registry
 *
 * Resolves calendar implementations by id. The set of calendars is fixed at
 * compile time; lookups by an arbitrary string go through getCalendar.
 */

import { type Result, Ok, Err } from './result'
import { UnknownCalendarError } from './errors'
import { ethiopic } from './ethiopic'
import type { Calendar, CalendarId } from './calendar'

export { UnknownCalendarError } from './errors'

const CALENDARS = {
  ethiopic,
} as const satisfies Record<CalendarId, Calendar>

export function isCalendarId(id: string): id is CalendarId {
  return Object.prototype.hasOwnProperty.call(CALENDARS, id)
}

export function calendarIds(): CalendarId[] {
  return Object.keys(CALENDARS).filter(isCalendarId)
}

export function getCalendar(id: string): Result<Calendar, UnknownCalendarError> {
  if (!isCalendarId(id)) return Err(new UnknownCalendarError(`Unknown calendar: '${id}'`))
  return Ok(CALENDARS[id])
}
