/**
 * Remediation trigger
 *
 * Called after every per-device window update. A confirmed-down site gets
 * exactly one power cycle of its outlet, then its window goes back to
 * neutral so later devices in the same pass cannot fire again and the
 * window has to fill up before the next attempt.
 *
 * Sites can share an outlet. The first site to confirm down in a pass claims
 * it in the ledger; another site confirming down against the same outlet in
 * that pass is reset without a second cycle.
 */

import { isConfirmedDown, resetLiveness } from '../liveness-tracker/liveness-tracker';
import { runPowerCycle } from '../power-cycle/power-cycle';
import type { PowerCycleResult } from '../power-cycle/types';
import { targetKey } from './helpers';
import type { RemediationCheckResult, RemediationContext, RemediationSite } from './types';

/**
 * Remediate a site if its liveness window is confirmed down
 *
 * @param site - Site to check (its window is reset when the trigger fires)
 * @param context - UPS session factory, power-cycle options, ledger and logger
 * @returns What was done
 */
export async function checkRemediation(
  site: RemediationSite,
  context: RemediationContext
): Promise<RemediationCheckResult> {
  if (!isConfirmedDown(site.liveness)) {
    return { action: 'idle' };
  }

  const { ledger, logger } = context;
  const { ups, outlet } = site.target;
  const key = targetKey(site.target);
  const claimedBy = ledger.get(key);

  if (claimedBy !== undefined) {
    logger.warning(
      `Site ${site.id} confirmed down, but outlet ${outlet} on UPS ${ups} was already power cycled for site ${claimedBy} this pass. Skipping.`
    );
    resetLiveness(site.liveness);
    return { action: 'skipped', claimedBy };
  }

  ledger.set(key, site.id);
  logger.warning(`Site ${site.id}: all ${site.liveness.size} probes reported down`);
  logger.info(`Beginning power cycle operation for outlet ${outlet} on UPS ${ups}`);

  let result: PowerCycleResult;
  try {
    const session = await context.openSession(ups);
    result = await runPowerCycle(outlet, session, context.powerCycle);
  } finally {
    resetLiveness(site.liveness);
  }

  if (result.outcome === 'SUCCESS') {
    logger.info(`Power cycle of outlet ${outlet} on UPS ${ups} complete (attempts: ${result.attempts})`);
  } else {
    logger.critical(`Power cycle of outlet ${outlet} on UPS ${ups} for site ${site.id} failed: ${result.reason ?? 'unknown'}`);
  }

  return { action: 'remediated', result };
}
