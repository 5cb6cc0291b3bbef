/**
 * Liveness tracker helper functions
 */

import { WindowValidationError } from '$types/errors';
import { isInteger } from '@utils/number';
import type { LivenessSample } from '$types/common';

/**
 * Validate a window size
 * @param size - Requested number of samples
 * @throws {WindowValidationError} If size is not a positive integer
 */
export function validateWindowSize(size: number): void {
  if (!isInteger(size) || size < 1) {
    throw new WindowValidationError(`Liveness window size must be a positive integer, got ${size}`);
  }
}

/**
 * Build a neutral sample list
 * @param size - Number of samples
 * @returns Array of `size` nulls
 */
export function neutralSamples(size: number): LivenessSample[] {
  return new Array<LivenessSample>(size).fill(null);
}
