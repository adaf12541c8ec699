/**
 * Shared value types
 *
 * Plain immutable records passed between the calendar, the ISO utility and
 * callers. No type here is bound to a particular calendar.
 */

/** Signed day count; day 0 is the proleptic Gregorian 0000-01-01. */
export type IsoDays = number

export interface CivilDate {
  readonly year: number
  readonly month: number
  readonly day: number
}

export interface TimeOfDay {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
}

export interface NaiveDateTime extends CivilDate, TimeOfDay {}

/** Elapsed part of a day as numerator / denominator, 0 <= value < 1. */
export interface DayFraction {
  readonly numerator: number
  readonly denominator: number
}

export interface IsoDaysWithFraction {
  readonly days: IsoDays
  readonly fraction: DayFraction
}

export type Era = 0 | 1

export interface YearOfEra {
  readonly year: number
  readonly era: Era
}

export interface DayOfEra {
  readonly day: number
  readonly era: Era
}
