/**
 * Power-cycle controller type definitions
 */

import type { Sleeper } from '$types/common';
import type { Logger } from '@logging';

/**
 * Controller states
 *
 * CHECK_INITIAL → OFF_IF_ON → WAIT → CHECK_RETRY → ON_IF_OFF → WAIT_CONFIRM →
 * CHECK_CONFIRM → SUCCESS | RETRY | FAILED. RETRY loops back to WAIT while
 * attempts remain.
 */
export type PowerCycleState =
  | 'CHECK_INITIAL'
  | 'OFF_IF_ON'
  | 'WAIT'
  | 'CHECK_RETRY'
  | 'ON_IF_OFF'
  | 'WAIT_CONFIRM'
  | 'CHECK_CONFIRM'
  | 'RETRY'
  | 'SUCCESS'
  | 'FAILED';

export type PowerCycleOutcome = 'SUCCESS' | 'FAILED';

/**
 * Why a power cycle failed
 * - no_session: the UPS could not be logged in to, no outlet call was made
 * - retries_exhausted: the outlet never confirmed ON within maxAttempts
 */
export type PowerCycleFailureReason = 'no_session' | 'retries_exhausted';

/**
 * Timing, retry bound and collaborators for one power cycle
 */
export interface PowerCycleOptions {
  /** Delay before each re-check of the outlet (ms) */
  settleMs: number;
  /** Delay between switching on and confirming (ms) */
  confirmMs: number;
  /** Maximum retry-loop attempts */
  maxAttempts: number;
  /** Awaitable delay */
  sleep: Sleeper;
  logger: Logger;
}

/**
 * Result of one power cycle
 */
export interface PowerCycleResult {
  outcome: PowerCycleOutcome;
  /** Retry-loop attempts started (0 when no outlet call was made) */
  attempts: number;
  /** Present when outcome is FAILED */
  reason?: PowerCycleFailureReason;
  /** Every state entered, in order */
  trace: PowerCycleState[];
}
