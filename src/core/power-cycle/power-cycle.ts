/**
 * Outlet power-cycle controller
 *
 * Drives one outlet through off → settle → on → confirm with a bounded number
 * of attempts. Outlet API failures never throw out of here: a failed status
 * query reads as "not on", a failed switch is logged and the next check
 * decides what happens.
 *
 * ## Flow
 * - CHECK_INITIAL: outlet reported ON goes to OFF_IF_ON; OFF or unknown goes
 *   straight into the retry loop without switching
 * - WAIT / CHECK_RETRY: after the settle delay an outlet already ON is SUCCESS
 * - ON_IF_OFF / WAIT_CONFIRM / CHECK_CONFIRM: switch on, wait, re-check
 * - RETRY: another attempt while attempts < maxAttempts, else FAILED
 */

import type { OutletReading, OutletSession } from '$types/common';
import { validatePowerCycleOptions } from './helpers';
import type { PowerCycleOptions, PowerCycleResult, PowerCycleState } from './types';

/**
 * Run one power cycle against an outlet
 *
 * @param outlet - Outlet number on the UPS
 * @param session - Authenticated UPS session, null when login failed
 * @param options - Timing, retry bound, sleep and logger
 * @returns Outcome, attempts used and the state trace
 * @throws {PowerCycleValidationError} If options are invalid
 *
 * @example
 * ```typescript
 * const result = await runPowerCycle(2, session, {
 *   settleMs: 5000, confirmMs: 2000, maxAttempts: 3, sleep, logger
 * });
 * if (result.outcome === 'FAILED') logger.critical(`Power cycle failed: ${result.reason}`);
 * ```
 */
export async function runPowerCycle(
  outlet: number,
  session: OutletSession | null,
  options: PowerCycleOptions
): Promise<PowerCycleResult> {
  validatePowerCycleOptions(options);
  const { logger } = options;

  if (session === null) {
    logger.warning(`No UPS session, outlet ${outlet} left untouched`);
    return { outcome: 'FAILED', attempts: 0, reason: 'no_session', trace: ['FAILED'] };
  }

  const trace: PowerCycleState[] = [];
  let state: PowerCycleState = 'CHECK_INITIAL';
  let attempt = 0;
  let reading: OutletReading = null;

  for (;;) {
    trace.push(state);

    switch (state) {
      case 'CHECK_INITIAL':
        reading = await session.getOutletState(outlet);
        if (reading === true) {
          state = 'OFF_IF_ON';
        } else {
          attempt = 1;
          state = 'WAIT';
        }
        break;

      case 'OFF_IF_ON':
        if (!(await session.setOutletState(outlet, false))) {
          logger.warning(`Switch-off request for outlet ${outlet} was not accepted`);
        }
        attempt = 1;
        state = 'WAIT';
        break;

      case 'WAIT':
        logger.info(`Waiting... (attempt ${attempt}/${options.maxAttempts})`);
        await options.sleep(options.settleMs);
        state = 'CHECK_RETRY';
        break;

      case 'CHECK_RETRY':
        reading = await session.getOutletState(outlet);
        state = reading === true ? 'SUCCESS' : 'ON_IF_OFF';
        break;

      case 'ON_IF_OFF':
        if (!(await session.setOutletState(outlet, true))) {
          logger.warning(`Switch-on request for outlet ${outlet} was not accepted`);
        }
        state = 'WAIT_CONFIRM';
        break;

      case 'WAIT_CONFIRM':
        await options.sleep(options.confirmMs);
        state = 'CHECK_CONFIRM';
        break;

      case 'CHECK_CONFIRM':
        reading = await session.getOutletState(outlet);
        state = reading === true ? 'SUCCESS' : 'RETRY';
        break;

      case 'RETRY':
        if (attempt >= options.maxAttempts) {
          state = 'FAILED';
        } else {
          attempt++;
          state = 'WAIT';
        }
        break;

      case 'SUCCESS':
        return { outcome: 'SUCCESS', attempts: attempt, trace };

      case 'FAILED':
        logger.critical(`Not able to complete operation on outlet ${outlet} after ${attempt} attempts`);
        return { outcome: 'FAILED', attempts: attempt, reason: 'retries_exhausted', trace };
    }
  }
}
