/**
 * Remediation trigger type definitions
 */

import type { OutletSession, OutletTarget } from '$types';
import type { Logger } from '@logging';
import type { LivenessWindow } from '../liveness-tracker/types';
import type { PowerCycleOptions, PowerCycleResult } from '../power-cycle/types';

/**
 * The parts of a site the trigger reads and resets
 */
export interface RemediationSite {
  readonly id: number;
  readonly target: OutletTarget;
  liveness: LivenessWindow;
}

/**
 * Outlets claimed during the current pass
 *
 * Keyed by targetKey(); the value is the id of the site whose confirmed
 * outage claimed the outlet. Cleared at the start of every pass.
 */
export type RemediationLedger = Map<string, number>;

/**
 * Collaborators needed to remediate a site
 */
export interface RemediationContext {
  /** Open a session with the UPS at address (null when login fails) */
  openSession(address: string): Promise<OutletSession | null>;
  powerCycle: PowerCycleOptions;
  ledger: RemediationLedger;
  logger: Logger;
}

/**
 * What checkRemediation did
 * - idle: site not confirmed down
 * - skipped: confirmed down, but the outlet was already claimed this pass
 * - remediated: a power cycle ran
 */
export type RemediationCheckResult =
  | { action: 'idle' }
  | { action: 'skipped'; claimedBy: number }
  | { action: 'remediated'; result: PowerCycleResult };
