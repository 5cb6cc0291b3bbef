/**
 * Site liveness window type definitions
 */

import type { LivenessSample } from '$types/common';

/**
 * Fixed-size window of recent probe outcomes for one site (mutable)
 *
 * samples[0] is the newest entry. The array always holds exactly `size`
 * entries; null marks a neutral slot left by creation or reset.
 */
export interface LivenessWindow {
  /** Number of samples kept (trigger.count) */
  readonly size: number;
  /** Samples, newest first */
  samples: LivenessSample[];
}
