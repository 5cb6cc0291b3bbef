/**
 * SD-WAN response parsing and inventory filtering
 */

import type { PathRecord } from '$types';
import { isRecord } from '@utils/http';
import type { Logger } from '@logging';
import type { SdwanDevice } from './types';

/** Personalities of controller nodes, which are never monitored */
export const CONTROLLER_PERSONALITIES: readonly string[] = ['vmanage', 'vbond', 'vsmart'];

/** Reachability value of a device the manager can reach */
export const REACHABLE = 'reachable';

/**
 * Parse one inventory entry
 *
 * The manager reports `site-id` as a string; entries without a usable
 * `system-ip` are dropped.
 *
 * @param raw - Element of the inventory `data` array
 * @returns Parsed device, or null when the entry is unusable
 */
export function parseDevice(raw: unknown): SdwanDevice | null {
  if (!isRecord(raw)) return null;

  const systemIp = raw['system-ip'];
  if (typeof systemIp !== 'string' || systemIp === '') return null;

  const rawSite = raw['site-id'];
  const siteNumber = typeof rawSite === 'number' ? rawSite : Number(rawSite);

  return {
    siteId: rawSite !== undefined && rawSite !== null && rawSite !== '' && Number.isInteger(siteNumber) ? siteNumber : null,
    personality: typeof raw.personality === 'string' ? raw.personality : '',
    reachability: typeof raw.reachability === 'string' ? raw.reachability : '',
    systemIp
  };
}

/**
 * Extract the `data` array of a dataservice response
 * @param body - Parsed JSON body
 * @returns The data array
 */
export function extractData(body: Record<string, unknown>): unknown[] {
  const data = body.data;
  if (!Array.isArray(data)) {
    throw new Error('Response has no data array');
  }
  return data;
}

/**
 * Parse BFD state records, keeping the fields the classifier needs
 * @param data - `data` array of the BFD state response
 * @returns Records with state and local color
 */
export function parsePathRecords(data: unknown[]): PathRecord[] {
  const records: PathRecord[] = [];
  for (const entry of data) {
    if (!isRecord(entry)) continue;
    const state = entry.state;
    const color = entry['local-color'];
    if (typeof state === 'string' && typeof color === 'string') {
      records.push({ state, color });
    }
  }
  return records;
}

/**
 * Group monitored device system IPs by configured site
 *
 * Skips controllers, devices at sites that are not configured, and devices
 * the manager cannot reach. Every configured site gets an entry, possibly
 * empty.
 *
 * @param devices - Manager inventory
 * @param siteIds - Configured site ids
 * @param logger - Optional logger for skip decisions
 * @returns Site id to ordered list of system IPs
 */
export function collectSiteDevices(
  devices: readonly SdwanDevice[],
  siteIds: Iterable<number>,
  logger?: Logger
): Map<number, string[]> {
  const result = new Map<number, string[]>();
  for (const id of siteIds) {
    result.set(id, []);
  }

  for (const device of devices) {
    if (CONTROLLER_PERSONALITIES.includes(device.personality)) {
      logger?.debug(`Skipping controller: ${device.personality}`);
      continue;
    }

    const siteDevices = device.siteId === null ? undefined : result.get(device.siteId);
    if (!siteDevices) {
      logger?.debug(`Skip device with Site ID: ${device.siteId ?? 'none'}`);
      continue;
    }

    if (device.reachability !== REACHABLE) {
      logger?.debug(`Skipping unreachable device: ${device.systemIp}`);
      continue;
    }

    logger?.debug(`Adding device: ${device.systemIp}`);
    siteDevices.push(device.systemIp);
  }

  return result;
}
