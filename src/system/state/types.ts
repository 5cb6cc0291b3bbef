/**
 * Monitor state type definitions
 */

import type { TriggerConfig } from '$types/config';
import type { RemediationLedger, RemediationSite } from '@core/remediation-trigger';

/**
 * Runtime state of one monitored site (mutable)
 */
export interface SiteState extends RemediationSite {
  /** Transport color whose path liveness is probed */
  readonly color: string;
  /** System IPs of the site's edge devices, probed in order */
  devices: string[];
}

/**
 * Everything the monitor loop owns
 */
export interface MonitorState {
  // ═══════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════
  readonly trigger: TriggerConfig;

  // ═══════════════════════════════════════════════════════════════
  // SITES
  // In configuration order; each owns its liveness window.
  // ═══════════════════════════════════════════════════════════════
  sites: SiteState[];

  // ═══════════════════════════════════════════════════════════════
  // REMEDIATION
  // Outlets claimed during the pass in progress.
  // ═══════════════════════════════════════════════════════════════
  ledger: RemediationLedger;

  // ═══════════════════════════════════════════════════════════════
  // COUNTERS
  // Reported at the end of every pass.
  // ═══════════════════════════════════════════════════════════════
  /** Seconds timestamp the monitor was created at */
  startTime: number;
  cycleCount: number;
  /** Power cycles started since startup */
  remediationCount: number;
  /** Passes in a row in which at least one site check threw */
  consecutiveCrashPasses: number;
}
