/**
 * Time utility functions
 */

import type { TimerAPI } from '$types/common';
import { TIME_CONSTANTS } from '../constants';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / TIME_CONSTANTS.MS_PER_SECOND);
}

/**
 * Convert seconds to milliseconds
 * @param seconds - Duration in seconds
 * @returns Duration in milliseconds
 */
export function secondsToMs(seconds: number): number {
  return seconds * TIME_CONSTANTS.MS_PER_SECOND;
}

/**
 * Wait for the given number of milliseconds
 *
 * Not cancellable: the only way out of a pending sleep is process exit.
 *
 * @param ms - Delay in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * TimerAPI backed by setTimeout
 *
 * Timers are unref'd so a pending retry never holds the process open on its own.
 */
export const nodeTimer: TimerAPI = {
  set(delayMs: number, callback: () => void): void {
    setTimeout(callback, delayMs).unref();
  }
};
