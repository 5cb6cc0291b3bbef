/**
 * Type definitions for watchdog configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * Remediation target: one switchable outlet on a UPS
 */
export interface OutletTarget {
  /** UPS management address (IP or hostname) */
  readonly ups: string;
  /** Outlet number on the UPS power distribution */
  readonly outlet: number;
}

/**
 * Per-site configuration entry
 */
export interface SiteConfig extends OutletTarget {
  /** SD-WAN transport color whose BFD sessions are watched */
  readonly color: string;
}

/**
 * Trigger configuration - immutable for the process lifetime
 */
export interface TriggerConfig {
  /** Seconds between poll passes */
  readonly interval: number;
  /** Window size: consecutive DOWN samples required to fire */
  readonly count: number;
}

/**
 * Contents of the YAML configuration file after validation
 */
export interface WatchdogFileConfig {
  readonly trigger: TriggerConfig;
  readonly sites: ReadonlyMap<number, SiteConfig>;
}

/**
 * Settings read from the environment (.env)
 */
export interface WatchdogEnvConfig {
  readonly SDWAN_URL: string;
  readonly SDWAN_USER: string;
  readonly SDWAN_PASS: string;
  readonly UPS_USER: string;
  readonly UPS_PASS: string;
  readonly LOG_LEVEL: LogLevel;
  readonly HTTP_TIMEOUT_MS: number;
  readonly TLS_VERIFY: boolean;
  readonly SLACK_WEBHOOK_URL: string | null;
  readonly SLACK_LOG_LEVEL: LogLevel;
  readonly CONFIG_PATH: string;
}

/**
 * Fixed application constants
 */
export interface WatchdogAppConstants {
  readonly LOG_LEVELS: LogLevels;

  // ───────── POWER CYCLE ─────────
  readonly POWER_CYCLE_SETTLE_MS: number;
  readonly POWER_CYCLE_CONFIRM_MS: number;
  readonly POWER_CYCLE_MAX_ATTEMPTS: number;

  // ───────── CONFIG ─────────
  readonly DEFAULT_CONFIG_PATH: string;
  readonly DEFAULT_HTTP_TIMEOUT_MS: number;

  // ───────── LOGGING ─────────
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_MS: number;
  readonly SLACK_MAX_RETRIES: number;
}
