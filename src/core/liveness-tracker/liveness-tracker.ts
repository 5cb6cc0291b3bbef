/**
 * Site liveness tracking
 *
 * Each site keeps a sliding window of its most recent probe outcomes. A site
 * counts as confirmed down only when every slot holds DOWN, so a window of
 * size N needs N consecutive DOWN probes after the last reset.
 */

import type { ProbeOutcome } from '$types/common';
import { neutralSamples, validateWindowSize } from './helpers';
import type { LivenessWindow } from './types';

/**
 * Create a neutral liveness window
 *
 * @param size - Number of samples to keep
 * @returns Window holding `size` neutral samples
 * @throws {WindowValidationError} If size is not a positive integer
 */
export function createLivenessWindow(size: number): LivenessWindow {
  validateWindowSize(size);
  return { size, samples: neutralSamples(size) };
}

/**
 * Insert the newest outcome and evict the oldest (mutates window in place)
 *
 * @param window - Window to update
 * @param outcome - Outcome of the latest probe
 * @returns The same window (for convenience)
 */
export function updateLiveness(window: LivenessWindow, outcome: ProbeOutcome): LivenessWindow {
  window.samples.unshift(outcome);
  window.samples.length = window.size;
  return window;
}

/**
 * Check whether every sample in the window is DOWN
 * @param window - Window to inspect
 * @returns True when the site is confirmed down
 */
export function isConfirmedDown(window: LivenessWindow): boolean {
  return window.samples.every((sample) => sample === 'DOWN');
}

/**
 * Count DOWN samples (status reporting only)
 * @param window - Window to inspect
 * @returns Number of DOWN samples
 */
export function countDown(window: LivenessWindow): number {
  return window.samples.filter((sample) => sample === 'DOWN').length;
}

/**
 * Return the window to all-neutral (mutates window in place)
 * @param window - Window to reset
 * @returns The same window (for convenience)
 */
export function resetLiveness(window: LivenessWindow): LivenessWindow {
  window.samples = neutralSamples(window.size);
  return window;
}
