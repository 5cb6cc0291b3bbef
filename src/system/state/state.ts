/**
 * State management functions
 * Builds the monitor's initial state from validated configuration
 */

import { createLivenessWindow } from '@core/liveness-tracker';
import { createRemediationLedger } from '@core/remediation-trigger';
import type { WatchdogFileConfig } from '$types/config';
import type { MonitorState, SiteState } from './types';

export * from './types';

/**
 * Create initial monitor state
 *
 * Every site starts with a neutral liveness window of `trigger.count`
 * samples, so a site needs `count` DOWN probes before the first power cycle.
 *
 * @param nowSec - Current timestamp in seconds
 * @param config - Validated configuration file contents
 * @param devicesBySite - Edge device system IPs per site id (missing sites get none)
 * @returns Initial MonitorState
 *
 * @example
 * ```typescript
 * const devices = collectSiteDevices(await sdwan.listDevices(), config.sites.keys());
 * const state = createMonitorState(now(), config, devices);
 * ```
 */
export function createMonitorState(
  nowSec: number,
  config: WatchdogFileConfig,
  devicesBySite: ReadonlyMap<number, readonly string[]>
): MonitorState {
  const sites: SiteState[] = [];

  for (const [id, site] of config.sites) {
    sites.push({
      id,
      color: site.color,
      target: { ups: site.ups, outlet: site.outlet },
      devices: [...(devicesBySite.get(id) ?? [])],
      liveness: createLivenessWindow(config.trigger.count)
    });
  }

  return {
    trigger: config.trigger,
    sites,
    ledger: createRemediationLedger(),
    startTime: nowSec,
    cycleCount: 0,
    remediationCount: 0,
    consecutiveCrashPasses: 0
  };
}
