/**
 * Monitor loop helpers
 */

import { checkRemediation, classifyProbe, countDown, updateLiveness } from '@core';
import type { RemediationCheckResult } from '@core';
import type { SiteState } from '@system/state';
import type { Monitor } from './types';

/**
 * Status line written after each site
 * @param siteId - Site id
 * @param down - DOWN samples in the window
 * @param count - Window size
 * @returns e.g. "Site 100 status: 2/3 probes reported down"
 */
export function formatSiteStatus(siteId: number, down: number, count: number): string {
  return `Site ${siteId} status: ${down}/${count} probes reported down`;
}

/**
 * Per-site tallies returned by checkSite
 */
export interface SiteCheckResult {
  probes: number;
  remediations: number;
  skipped: number;
}

function tally(result: SiteCheckResult, check: RemediationCheckResult): void {
  if (check.action === 'remediated') result.remediations++;
  if (check.action === 'skipped') result.skipped++;
}

/**
 * Probe every device of one site, updating its window and firing remediation
 *
 * Each device contributes exactly one sample. Remediation runs inline, so the
 * next device is only probed once any power cycle has finished.
 *
 * @param site - Site to check (window mutated in place)
 * @param monitor - Monitor collaborators
 * @returns Probe and remediation tallies
 */
export async function checkSite(site: SiteState, monitor: Monitor): Promise<SiteCheckResult> {
  const { logger } = monitor;
  const result: SiteCheckResult = { probes: 0, remediations: 0, skipped: 0 };

  for (const device of site.devices) {
    logger.debug(`Checking device ${device} at site ID ${site.id}`);

    const status = await monitor.paths.getPathStatus(device, site.color);
    if (!status.ok) {
      logger.warning(`Failed to query BFD state for ${device} / ${site.color}: ${status.error}`);
    }

    const outcome = classifyProbe(status, site.color);
    updateLiveness(site.liveness, outcome);
    result.probes++;
    logger.debug(`Device ${device} at site ${site.id}: ${outcome}`);

    tally(result, await checkRemediation(site, {
      openSession: monitor.openSession,
      powerCycle: monitor.powerCycle,
      ledger: monitor.state.ledger,
      logger
    }));
  }

  logger.info(formatSiteStatus(site.id, countDown(site.liveness), site.liveness.size));
  return result;
}
