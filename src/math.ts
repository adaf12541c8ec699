/**
 * Floor arithmetic
 *
 * Division and remainder that round toward negative infinity, so that
 * negative years and day counts behave like positive ones.
 */

export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b)
}

/** Remainder with the sign of the divisor: floorMod(-1, 4) === 3. */
export function floorMod(a: number, b: number): number {
  return a - b * Math.floor(a / b)
}

/** Adjusted modulo in 1..b: a multiple of b maps to b rather than 0. */
export function amod(a: number, b: number): number {
  const r = floorMod(a, b)
  return r === 0 ? b : r
}

/**
 * Splits a 1-based ordinal into whole cycles and an adjusted remainder:
 * divAmod(14, 13) → [1, 1], divAmod(13, 13) → [0, 13], divAmod(0, 13) → [-1, 13].
 */
export function divAmod(a: number, b: number): [number, number] {
  const r = amod(a, b)
  return [(a - r) / b, r]
}
