/**
 * Property tests for the Ethiopic day-count conversion.
 *
 * Round trip, monotonicity, and agreement with validity and year lengths.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  dateToIsoDays,
  dateFromIsoDays,
  validDate,
  daysInYear,
  isLeapYear,
} from '../../../src/ethiopic'
import { civilDateGen, yearEndDateGen, isoDaysGen, anyYearGen } from '../generators/civil'

describe('Day counts - Round Trip', () => {
  it('dateFromIsoDays ∘ dateToIsoDays = identity for valid dates', () => {
    fc.assert(
      fc.property(civilDateGen(), ({ year, month, day }) => {
        expect(dateFromIsoDays(dateToIsoDays(year, month, day))).toEqual({ year, month, day })
      })
    )
  })

  it('round trips the end of every year', () => {
    fc.assert(
      fc.property(yearEndDateGen(), ({ year, month, day }) => {
        expect(dateFromIsoDays(dateToIsoDays(year, month, day))).toEqual({ year, month, day })
      })
    )
  })

  it('dateToIsoDays ∘ dateFromIsoDays = identity for day counts', () => {
    fc.assert(
      fc.property(isoDaysGen(), (days) => {
        const { year, month, day } = dateFromIsoDays(days)
        expect(dateToIsoDays(year, month, day)).toBe(days)
      })
    )
  })
})

describe('Day counts - Structure', () => {
  it('every day count maps to a valid date', () => {
    fc.assert(
      fc.property(isoDaysGen(), (days) => {
        const { year, month, day } = dateFromIsoDays(days)
        expect(validDate(year, month, day)).toBe(true)
      })
    )
  })

  it('consecutive day counts map to consecutive dates', () => {
    fc.assert(
      fc.property(isoDaysGen(), (days) => {
        const today = dateFromIsoDays(days)
        const tomorrow = dateFromIsoDays(days + 1)
        if (tomorrow.year === today.year && tomorrow.month === today.month) {
          expect(tomorrow.day).toBe(today.day + 1)
        } else {
          expect(tomorrow.day).toBe(1)
        }
      })
    )
  })

  it('a year spans daysInYear day counts', () => {
    fc.assert(
      fc.property(anyYearGen(), (year) => {
        expect(dateToIsoDays(year + 1, 1, 1) - dateToIsoDays(year, 1, 1)).toBe(daysInYear(year))
      })
    )
  })

  it('leap years repeat every four years', () => {
    fc.assert(
      fc.property(anyYearGen(), (year) => {
        expect(isLeapYear(year + 4)).toBe(isLeapYear(year))
      })
    )
  })
})
