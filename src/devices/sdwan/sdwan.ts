/**
 * SD-WAN manager REST client
 *
 * Form login against j_security_check yields a JSESSIONID cookie; the
 * dataservice token endpoint then issues the XSRF token sent on later calls.
 * Node's fetch keeps no cookie jar, so the session cookie is replayed by hand.
 */

import { AuthenticationError, describeError } from '$types';
import type { PathStatusResult } from '$types';
import { findCookie, requestJson, requestText, requestWithTimeout } from '@utils/http';
import { extractData, parseDevice, parsePathRecords } from './helpers';
import type { SdwanClient, SdwanClientConfig, SdwanClientDependencies, SdwanDevice } from './types';

const SESSION_COOKIE = 'JSESSIONID';

/**
 * Create an SD-WAN manager client
 *
 * @param config - Base URL, credentials and timeout
 * @param deps - fetch implementation and logger
 * @returns Client; call authenticate() before anything else
 *
 * @example
 * ```typescript
 * const sdwan = createSdwanClient(
 *   { baseUrl: env.SDWAN_URL, username: env.SDWAN_USER, password: env.SDWAN_PASS, timeoutMs: 5000 },
 *   { fetchImpl: fetch, logger }
 * );
 * await sdwan.authenticate();
 * const status = await sdwan.getPathStatus('10.1.1.1', 'biz-internet');
 * ```
 */
export function createSdwanClient(config: SdwanClientConfig, deps: SdwanClientDependencies): SdwanClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const { fetchImpl, logger } = deps;

  let sessionId: string | null = null;
  let xsrfToken: string | null = null;

  function authHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (sessionId) headers.Cookie = `${SESSION_COOKIE}=${sessionId}`;
    if (xsrfToken) headers['X-XSRF-TOKEN'] = xsrfToken;
    return headers;
  }

  function getJson(path: string): Promise<Record<string, unknown>> {
    return requestJson(fetchImpl, `${baseUrl}${path}`, { method: 'GET', headers: authHeaders() }, config.timeoutMs);
  }

  async function authenticate(): Promise<void> {
    logger.info(`Attempting to authenticate to: ${baseUrl}`);

    let response: Response;
    try {
      response = await requestWithTimeout(fetchImpl, `${baseUrl}/j_security_check`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ j_username: config.username, j_password: config.password }).toString()
      }, config.timeoutMs, async (res) => res);
    } catch (err) {
      throw new AuthenticationError(baseUrl, `Failed to authenticate to ${baseUrl}: ${describeError(err)}`);
    }

    const cookie = findCookie(response, SESSION_COOKIE);
    if (response.status !== 200 || !cookie) {
      throw new AuthenticationError(baseUrl, `Failed to authenticate. Status code: ${response.status}`);
    }

    sessionId = cookie;
    logger.info('Got authentication token!');

    try {
      const token = (await requestText(
        fetchImpl, `${baseUrl}/dataservice/client/token`, { method: 'GET', headers: authHeaders() }, config.timeoutMs
      )).trim();
      xsrfToken = token === '' ? null : token;
    } catch (err) {
      logger.warning(`Could not fetch XSRF token, continuing without it: ${describeError(err)}`);
    }
  }

  async function listDevices(): Promise<SdwanDevice[]> {
    const body = await getJson('/dataservice/device');
    const devices: SdwanDevice[] = [];
    for (const raw of extractData(body)) {
      const device = parseDevice(raw);
      if (device) {
        devices.push(device);
      } else {
        logger.debug('Ignoring inventory entry without system-ip');
      }
    }
    return devices;
  }

  async function getPathStatus(device: string, color: string): Promise<PathStatusResult> {
    const query = new URLSearchParams({ deviceId: device, 'local-color': color });
    try {
      const body = await getJson(`/dataservice/device/bfd/state/device?${query.toString()}`);
      const records = parsePathRecords(extractData(body));
      logger.debug(`BFD state for ${device} / ${color}: ${records.map((r) => `${r.color}=${r.state}`).join(', ') || 'no sessions'}`);
      return { ok: true, records };
    } catch (err) {
      return { ok: false, error: describeError(err) };
    }
  }

  return {
    authenticate,
    listDevices,
    getPathStatus
  };
}
