/**
 * UPS network card client type definitions
 */

import type { FetchFn, OutletSession } from '$types';
import type { Logger } from '@logging';

/**
 * Credentials and timeout shared by every UPS
 */
export interface UpsClientConfig {
  username: string;
  password: string;
  /** Per-request timeout */
  timeoutMs: number;
}

export interface UpsClientDependencies {
  fetchImpl: FetchFn;
  logger: Logger;
}

export interface UpsClient {
  /** Log in to the UPS at address; null when that fails */
  openSession(address: string): Promise<OutletSession | null>;
}
