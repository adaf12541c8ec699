/**
 * Segment 01: Floor Arithmetic
 *
 * Division and remainder rounding toward negative infinity, and the
 * 1-based adjusted modulo used for weekdays and month rollover.
 */

import { describe, it, expect } from 'vitest'
import { floorDiv, floorMod, amod, divAmod } from '../src/math'

describe('floorDiv', () => {
  it('matches truncation for positive operands', () => {
    expect(floorDiv(7, 2)).toBe(3)
    expect(floorDiv(8, 4)).toBe(2)
  })

  it('rounds toward negative infinity for negative dividends', () => {
    expect(floorDiv(-7, 2)).toBe(-4)
    expect(floorDiv(-1, 4)).toBe(-1)
    expect(floorDiv(-4, 4)).toBe(-1)
  })
})

describe('floorMod', () => {
  it('returns a non-negative remainder for a positive divisor', () => {
    expect(floorMod(5, 4)).toBe(1)
    expect(floorMod(-1, 4)).toBe(3)
    expect(floorMod(-5, 4)).toBe(3)
  })

  it('returns zero for exact multiples', () => {
    expect(floorMod(-8, 4)).toBe(0)
    expect(floorMod(0, 4)).toBe(0)
    expect(floorMod(12, 4)).toBe(0)
  })
})

describe('amod', () => {
  it('maps multiples of the modulus to the modulus', () => {
    expect(amod(0, 7)).toBe(7)
    expect(amod(7, 7)).toBe(7)
    expect(amod(-7, 7)).toBe(7)
  })

  it('keeps other remainders in 1..n', () => {
    expect(amod(8, 7)).toBe(1)
    expect(amod(-1, 7)).toBe(6)
    expect(amod(3, 7)).toBe(3)
  })
})

describe('divAmod', () => {
  it('rolls forward one cycle past the modulus', () => {
    expect(divAmod(14, 13)).toEqual([1, 1])
    expect(divAmod(27, 13)).toEqual([2, 1])
  })

  it('keeps the modulus itself in the current cycle', () => {
    expect(divAmod(13, 13)).toEqual([0, 13])
    expect(divAmod(26, 13)).toEqual([1, 13])
  })

  it('rolls back for zero and negative ordinals', () => {
    expect(divAmod(0, 13)).toEqual([-1, 13])
    expect(divAmod(-12, 13)).toEqual([-1, 1])
    expect(divAmod(-13, 13)).toEqual([-2, 13])
  })
})
