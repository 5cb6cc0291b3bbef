/**
 * UPS network management card client
 *
 * OAuth2 password grant on the card's REST API, then outlet status reads and
 * switch actions on power distribution 1. Every failure is reported as a
 * value (null / false) so a remediation attempt can carry on.
 */

import { describeError } from '$types';
import type { OutletReading, OutletSession } from '$types';
import { isRecord, requestJson, requestText } from '@utils/http';
import type { UpsClient, UpsClientConfig, UpsClientDependencies } from './types';

/** REST root on the management card */
export const UPS_API_PATH = '/rest/mbdetnrs/1.0';

/** Power distribution that carries the switchable outlets */
export const UPS_POWER_DISTRIBUTION = 1;

/**
 * Read status.switchedOn from an outlet resource
 * @param body - Parsed outlet JSON
 * @returns Outlet state, or null when the field is missing
 */
export function parseSwitchedOn(body: Record<string, unknown>): OutletReading {
  const status = body.status;
  if (!isRecord(status) || typeof status.switchedOn !== 'boolean') {
    return null;
  }
  return status.switchedOn;
}

/**
 * Create a UPS client
 *
 * @param config - Credentials and timeout
 * @param deps - fetch implementation and logger
 * @returns Client that opens one session per UPS address
 *
 * @example
 * ```typescript
 * const ups = createUpsClient({ username, password, timeoutMs: 5000 }, { fetchImpl: fetch, logger });
 * const session = await ups.openSession('10.0.0.5');
 * const on = await session?.getOutletState(2);
 * ```
 */
export function createUpsClient(config: UpsClientConfig, deps: UpsClientDependencies): UpsClient {
  const { fetchImpl, logger } = deps;

  async function openSession(address: string): Promise<OutletSession | null> {
    logger.info(`Connecting to UPS at: ${address}`);
    const apiRoot = `https://${address}${UPS_API_PATH}`;

    let token: unknown;
    try {
      const body = await requestJson(fetchImpl, `${apiRoot}/oauth2/token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          username: config.username,
          password: config.password,
          grant_type: 'password',
          scope: 'GUIAccess'
        })
      }, config.timeoutMs);
      token = body.access_token;
    } catch (err) {
      logger.warning(`Failed to connect / authenticate to UPS ${address}: ${describeError(err)}`);
      return null;
    }

    if (typeof token !== 'string' || token === '') {
      logger.warning(`UPS ${address} returned no access token`);
      return null;
    }

    logger.info('Got Auth token!');
    const headers = { Authorization: `Bearer ${token}` };
    const outletUrl = (outlet: number) => `${apiRoot}/powerDistributions/${UPS_POWER_DISTRIBUTION}/outlets/${outlet}`;

    async function getOutletState(outlet: number): Promise<OutletReading> {
      logger.info(`Checking status of outlet ${outlet} on UPS at ${address}`);
      try {
        const state = parseSwitchedOn(await requestJson(fetchImpl, outletUrl(outlet), { method: 'GET', headers }, config.timeoutMs));
        if (state === null) {
          logger.warning(`Outlet ${outlet} status on UPS ${address} has no switchedOn field`);
        } else {
          logger.info(`Outlet is currently ${state ? 'ON' : 'OFF'}`);
        }
        return state;
      } catch (err) {
        logger.warning(`Failed to get outlet status: ${describeError(err)}`);
        return null;
      }
    }

    async function setOutletState(outlet: number, on: boolean): Promise<boolean> {
      const operation = on ? 'On' : 'Off';
      logger.info(`Attempting to switch outlet ${outlet} to state: ${operation}`);
      try {
        await requestText(fetchImpl, `${outletUrl(outlet)}/actions/switch${operation}`, { method: 'POST', headers }, config.timeoutMs);
        logger.info('Action successful!');
        return true;
      } catch (err) {
        logger.warning(`Failed to modify outlet state: ${describeError(err)}`);
        return false;
      }
    }

    return {
      getOutletState,
      setOutletState
    };
  }

  return { openSession };
}
