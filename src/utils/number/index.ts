/**
 * Number utilities
 *
 * Readings arrive from CLI arguments, env files and JSON, so these guards
 * never coerce: a numeric string is not a number here.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * - isFinite("5") = true (coerces to number)
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): boolean {
  return isFiniteNumber(value) && Math.floor(value) === value;
}

/**
 * Round half away from zero to a fixed number of decimals
 *
 * @param value - Value to round
 * @param decimals - Number of decimal places (non-negative integer)
 * @returns Rounded value
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  const scaled = Math.round(Math.abs(value) * factor) / factor;
  return value < 0 ? -scaled : scaled;
}

/**
 * Compare two floats with a relative tolerance
 *
 * @param a - First value
 * @param b - Second value
 * @param relTol - Allowed difference relative to the larger magnitude (at least 1)
 * @returns true if the values are equal within tolerance
 */
export function nearlyEqual(a: number, b: number, relTol = 1e-9): boolean {
  return Math.abs(a - b) <= relTol * Math.max(1, Math.abs(a), Math.abs(b));
}
