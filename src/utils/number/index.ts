/**
 * Number utilities for validating values parsed from YAML and the environment
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Parse a base-10 integer from a string, falling back when absent or malformed
 * @param raw - Raw string (e.g. from process.env)
 * @param fallback - Value returned when raw is undefined, empty or not an integer
 * @returns Parsed integer or fallback
 */
export function parseIntOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) ? parsed : fallback;
}
