/**
 * Monitor loop implementation
 *
 * One pass walks every site and every device in order; nothing runs in
 * parallel. A site that throws is logged and counted, and the pass moves on.
 */

import { secondsToMs } from '@utils/time';
import { describeError } from '$types/errors';
import { checkSite } from './helpers';
import type { CycleSummary, Monitor, RunMonitorOptions } from './types';

/**
 * Run one monitoring pass over all sites
 *
 * @param monitor - Monitor state and collaborators
 * @returns Tallies for the pass
 */
export async function runCycle(monitor: Monitor): Promise<CycleSummary> {
  const { state, logger } = monitor;
  const summary: CycleSummary = { probes: 0, remediations: 0, skipped: 0, crashedSites: [] };

  state.ledger.clear();
  state.cycleCount++;
  logger.info('Beginning health checks...');

  for (const site of state.sites) {
    try {
      const result = await checkSite(site, monitor);
      summary.probes += result.probes;
      summary.remediations += result.remediations;
      summary.skipped += result.skipped;
    } catch (e) {
      logger.critical(`Site ${site.id} check crashed: ${describeError(e)}`);
      summary.crashedSites.push(site.id);
    }
  }

  if (summary.crashedSites.length > 0) {
    state.consecutiveCrashPasses++;
    logger.warning(`${summary.crashedSites.length} site check(s) crashed; ${state.consecutiveCrashPasses} pass(es) in a row with crashes`);
  } else {
    state.consecutiveCrashPasses = 0;
  }

  state.remediationCount += summary.remediations;
  const uptime = monitor.now() - state.startTime;
  logger.info(`Health checks complete. (pass ${state.cycleCount}, ${state.remediationCount} power cycle(s) since start, up ${uptime}s)`);
  return summary;
}

/**
 * Run passes forever, sleeping `trigger.interval` seconds between them
 *
 * @param monitor - Monitor state and collaborators
 * @param options - once / shouldContinue loop control
 *
 * @example
 * ```typescript
 * let running = true;
 * process.once('SIGTERM', () => { running = false; });
 * await runMonitor(monitor, { shouldContinue: () => running });
 * ```
 */
export async function runMonitor(monitor: Monitor, options: RunMonitorOptions = {}): Promise<void> {
  const shouldContinue = options.shouldContinue ?? (() => true);
  const intervalMs = secondsToMs(monitor.state.trigger.interval);

  for (;;) {
    await runCycle(monitor);

    if (options.once || !shouldContinue()) {
      return;
    }

    await monitor.sleep(intervalMs);

    if (!shouldContinue()) {
      return;
    }
  }
}
