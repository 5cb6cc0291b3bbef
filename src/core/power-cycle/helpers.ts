/**
 * Power-cycle helper functions
 */

import { PowerCycleValidationError } from '$types/errors';
import { isFiniteNumber, isInteger } from '@utils/number';
import type { PowerCycleOptions } from './types';

/**
 * Validate power-cycle timing and retry settings
 * @param options - Options to check
 * @throws {PowerCycleValidationError} If any setting is out of range
 */
export function validatePowerCycleOptions(options: PowerCycleOptions): void {
  if (!isFiniteNumber(options.settleMs) || options.settleMs < 0) {
    throw new PowerCycleValidationError(`settleMs must be a non-negative number, got ${options.settleMs}`);
  }
  if (!isFiniteNumber(options.confirmMs) || options.confirmMs < 0) {
    throw new PowerCycleValidationError(`confirmMs must be a non-negative number, got ${options.confirmMs}`);
  }
  if (!isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new PowerCycleValidationError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
  }
}
