/**
 * Probe classifier helper functions
 */

import type { PathRecord } from '$types/common';

/**
 * Keep the records whose local color matches the requested color
 * @param records - Records returned for one device
 * @param color - Transport color under watch
 * @returns Matching records, in input order
 */
export function recordsForColor(records: readonly PathRecord[], color: string): PathRecord[] {
  return records.filter((record) => record.color === color);
}

/**
 * Normalise a reported session state for comparison
 * @param state - Raw state string
 * @returns Lower-cased, trimmed state
 */
export function normalizeState(state: string): string {
  return state.trim().toLowerCase();
}
