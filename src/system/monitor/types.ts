/**
 * Monitor loop type definitions
 */

import type { OutletSession, PathStatusResult, Sleeper } from '$types/common';
import type { Logger } from '@logging';
import type { PowerCycleOptions } from '@core/power-cycle';
import type { MonitorState } from '@system/state';

/**
 * Source of path-status results (the SD-WAN client in production)
 */
export interface PathStatusSource {
  getPathStatus(device: string, color: string): Promise<PathStatusResult>;
}

/**
 * The monitor: its state plus every collaborator the loop calls
 */
export interface Monitor {
  state: MonitorState;
  logger: Logger;
  paths: PathStatusSource;
  /** Open a UPS session (null when login fails) */
  openSession(address: string): Promise<OutletSession | null>;
  powerCycle: PowerCycleOptions;
  /** Delay between passes */
  sleep: Sleeper;
  /** Current time in seconds */
  now: () => number;
}

/**
 * Loop control for runMonitor
 */
export interface RunMonitorOptions {
  /** Stop after the first pass */
  once?: boolean;
  /** Checked after every pass and every sleep; false stops the loop */
  shouldContinue?: () => boolean;
}

/**
 * What one pass did
 */
export interface CycleSummary {
  /** Probes issued across all sites */
  probes: number;
  /** Power cycles started (successful or not) */
  remediations: number;
  /** Confirmed outages skipped because their outlet was already cycled */
  skipped: number;
  /** Sites whose processing threw */
  crashedSites: number[];
}
