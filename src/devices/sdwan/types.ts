/**
 * SD-WAN manager client type definitions
 */

import type { FetchFn, PathStatusResult } from '$types';
import type { Logger } from '@logging';

/**
 * Device entry from the manager inventory
 */
export interface SdwanDevice {
  /** Numeric site id, null when the inventory entry carries none */
  siteId: number | null;
  /** Device role: vedge, vmanage, vbond, vsmart... */
  personality: string;
  /** "reachable" when the manager can talk to the device */
  reachability: string;
  /** System IP used as the device id in API calls */
  systemIp: string;
}

/**
 * Connection settings for the manager
 */
export interface SdwanClientConfig {
  /** Base URL, e.g. https://vmanage.example.test:8443 */
  baseUrl: string;
  username: string;
  password: string;
  /** Per-request timeout */
  timeoutMs: number;
}

export interface SdwanClientDependencies {
  fetchImpl: FetchFn;
  logger: Logger;
}

/**
 * Authenticated SD-WAN manager API
 */
export interface SdwanClient {
  /** Log in; throws AuthenticationError on any failure */
  authenticate(): Promise<void>;
  /** Fetch the device inventory; throws on transport or format failure */
  listDevices(): Promise<SdwanDevice[]>;
  /** Fetch BFD session state for one device and color; never throws */
  getPathStatus(device: string, color: string): Promise<PathStatusResult>;
}
