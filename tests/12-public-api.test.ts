/**
 * Segment 12: Public API
 *
 * The package entry point re-exports the calendar, the registry, the date
 * helpers and the ISO utilities.
 */

import { describe, it, expect } from 'vitest'
import {
  ethiopic,
  getCalendar,
  newDate,
  addMonths,
  toIsoDate,
  dateToString,
  isoDateToIsoDays,
  julianDateToIsoDays,
  floorMod,
  Ok,
  Err,
  CalendarErrorCode,
  NotDefinedError,
} from '../src/index'
import { unwrap } from './helpers/result'

describe('Public API', () => {
  it('constructs results', () => {
    expect(Ok(1)).toEqual({ ok: true, value: 1 })
    expect(Err('x')).toEqual({ ok: false, error: 'x' })
  })

  it('resolves the calendar and works with its dates', () => {
    const calendar = unwrap(getCalendar('ethiopic'))
    expect(calendar).toBe(ethiopic)

    const newYear = unwrap(newDate(calendar, 2016, 1, 1))
    expect(toIsoDate(newYear)).toEqual({ year: 2023, month: 9, day: 12 })

    const nextMonth = unwrap(addMonths(newYear, 1))
    expect(dateToString(nextMonth.year, nextMonth.month, nextMonth.day)).toBe('2016-02-01')
  })

  it('anchors the calendar on the Julian epoch', () => {
    expect(ethiopic.epoch()).toBe(julianDateToIsoDays(8, 8, 29))
    expect(ethiopic.dateToIsoDays(2016, 1, 1)).toBe(isoDateToIsoDays(2023, 9, 12))
  })

  it('exposes the error codes and the floor arithmetic', () => {
    expect(CalendarErrorCode.NOT_DEFINED).toBe('NOT_DEFINED')
    expect(floorMod(-1, 4)).toBe(3)
    const result = ethiopic.quarterOfYear(2016, 1, 1)
    expect(result.ok ? null : result.error).toBeInstanceOf(NotDefinedError)
  })
})
