/**
 * Common type definitions used throughout the project
 */

/**
 * Classified outcome of one path-status probe for a (device, color) pair
 */
export type ProbeOutcome = 'UP' | 'DOWN' | 'PARTIAL' | 'UNKNOWN';

/**
 * Liveness window sample - null is the neutral entry left by a reset
 */
export type LivenessSample = ProbeOutcome | null;

/**
 * Outlet state as reported by the UPS - null when the query failed
 */
export type OutletReading = boolean | null;

/**
 * Sleep for the given number of milliseconds
 */
export type Sleeper = (ms: number) => Promise<void>;

/**
 * Fetch-compatible function (injected so clients can be tested offline)
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * One-shot timer scheduling (injected so retry backoff can be tested)
 */
export interface TimerAPI {
  set(delayMs: number, callback: () => void): void;
}

/**
 * One path-liveness record reported for a device
 */
export interface PathRecord {
  /** Session state as reported, e.g. "up" or "down" */
  readonly state: string;
  /** Local transport color of the session */
  readonly color: string;
}

/**
 * Outcome of a path-status fetch - failures are values, not exceptions
 */
export type PathStatusResult =
  | { readonly ok: true; readonly records: readonly PathRecord[] }
  | { readonly ok: false; readonly error: string };

/**
 * Authenticated handle on a switchable outlet controller
 */
export interface OutletSession {
  /** Current outlet state, null when the query failed */
  getOutletState(outlet: number): Promise<OutletReading>;
  /** Request a state change, true when the controller accepted it */
  setOutletState(outlet: number, on: boolean): Promise<boolean>;
}
