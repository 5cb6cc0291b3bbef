/**
 * Probe classification
 *
 * Reduces the path-liveness records reported for one device to a single
 * outcome for the color under watch.
 */

import type { PathStatusResult, ProbeOutcome } from '$types/common';
import { normalizeState, recordsForColor } from './helpers';

/**
 * Classify one path-status fetch for a (device, color) pair
 *
 * - fetch failed, or no record for the color: UNKNOWN
 * - every record down: DOWN
 * - every record up: UP
 * - anything else: PARTIAL
 *
 * @param result - Path-status fetch result
 * @param color - Transport color under watch
 * @returns Probe outcome
 */
export function classifyProbe(result: PathStatusResult, color: string): ProbeOutcome {
  if (!result.ok) {
    return 'UNKNOWN';
  }

  const matching = recordsForColor(result.records, color);
  if (matching.length === 0) {
    return 'UNKNOWN';
  }

  const states = matching.map((record) => normalizeState(record.state));
  if (states.every((state) => state === 'down')) {
    return 'DOWN';
  }
  if (states.every((state) => state === 'up')) {
    return 'UP';
  }
  return 'PARTIAL';
}
