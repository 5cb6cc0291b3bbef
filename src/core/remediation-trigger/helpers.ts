/**
 * Remediation trigger helper functions
 */

import type { OutletTarget } from '$types';
import type { RemediationLedger } from './types';

/**
 * Identity of an outlet across sites
 * @param target - UPS address and outlet
 * @returns Key such as "10.0.0.5#2" (address compared case-insensitively)
 */
export function targetKey(target: OutletTarget): string {
  return `${target.ups.toLowerCase()}#${target.outlet}`;
}

/**
 * Create an empty ledger
 * @returns Ledger with no claimed outlets
 */
export function createRemediationLedger(): RemediationLedger {
  return new Map<string, number>();
}
