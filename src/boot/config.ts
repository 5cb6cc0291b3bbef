import { readFile } from 'node:fs/promises';

import yaml from 'js-yaml';

import { parseLogLevel } from '@logging';
import { parseIntOr } from '@utils/number';
import { validateConfig } from '@validation';
import { ConfigValidationError, describeError } from '$types/errors';

import type { ConfigValidationResult } from '@validation';
import type { WatchdogAppConstants, WatchdogEnvConfig } from '$types/config';

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Fixed values the watchdog relies on. Not read from the
//   environment; change only with a matching code review.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<WatchdogAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; LOG_LEVEL / SLACK_LOG_LEVEL must use these.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3 (standard convention).
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // ═══════════════════════════════════════════════════════════════
  // POWER CYCLE
  // ═══════════════════════════════════════════════════════════════

  // POWER_CYCLE_SETTLE_MS
  //   Role: Pause after switching the outlet off, before switching it back on.
  //   Critical: Edge appliances need a few seconds with no power to reset cleanly.
  //   Recommended: 5000 ms.
  POWER_CYCLE_SETTLE_MS: 5000,

  // POWER_CYCLE_CONFIRM_MS
  //   Role: Pause after the switch-on request, before reading the outlet back.
  //   Critical: The UPS card reports the old state for a moment after an action.
  //   Recommended: 2000 ms.
  POWER_CYCLE_CONFIRM_MS: 2000,

  // POWER_CYCLE_MAX_ATTEMPTS
  //   Role: Switch-on attempts before the power cycle is reported as failed.
  //   Critical: Must be >= 1; an outlet left off keeps the whole site dark.
  //   Recommended: 3.
  POWER_CYCLE_MAX_ATTEMPTS: 3,

  // ═══════════════════════════════════════════════════════════════
  // CONFIG
  // ═══════════════════════════════════════════════════════════════

  // DEFAULT_CONFIG_PATH
  //   Role: YAML file read when neither --config nor CONFIG_PATH is given.
  DEFAULT_CONFIG_PATH: './config.yaml',

  // DEFAULT_HTTP_TIMEOUT_MS
  //   Role: Per-request timeout for SD-WAN manager and UPS calls.
  //   Critical: Every request in a pass is sequential, so this bounds a pass.
  //   Recommended: 5000 ms.
  DEFAULT_HTTP_TIMEOUT_MS: 5000,

  // ═══════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════

  // SLACK_BUFFER_SIZE
  //   Role: Failed Slack messages kept for retry before the oldest is dropped.
  SLACK_BUFFER_SIZE: 10,

  // SLACK_RETRY_DELAY_MS
  //   Role: First retry delay; doubles on each failure (capped at 60 s).
  SLACK_RETRY_DELAY_MS: 1000,

  // SLACK_MAX_RETRIES
  //   Role: Retries per message before it is dropped.
  SLACK_MAX_RETRIES: 5,
};

/**
 * Environment variables that must be set
 */
export const REQUIRED_ENV = ['SDWAN_URL', 'SDWAN_USER', 'SDWAN_PASS', 'UPS_USER', 'UPS_PASS'] as const;

type RequiredEnvName = typeof REQUIRED_ENV[number];

/**
 * Parse a boolean flag from the environment
 * @param raw - Raw value, e.g. "true", "1", "no"
 * @param fallback - Value used when raw is missing or unrecognised
 * @returns Parsed flag
 */
export function parseBooleanFlag(raw: string | undefined, fallback: boolean): boolean {
  switch ((raw ?? '').trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      return fallback;
  }
}

/**
 * Read watchdog settings from the environment
 *
 * `.env` must already be loaded (main.ts calls dotenv before this).
 * All missing required variables are reported together.
 *
 * @param env - Environment map
 * @returns Parsed settings
 * @throws {ConfigValidationError} When required variables are missing or HTTP_TIMEOUT_MS is not positive
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): WatchdogEnvConfig {
  const problems: string[] = [];
  const required: Partial<Record<RequiredEnvName, string>> = {};

  for (const name of REQUIRED_ENV) {
    const value = env[name]?.trim();
    if (value) {
      required[name] = value;
    } else {
      problems.push(`${name} is required`);
    }
  }

  const timeoutMs = parseIntOr(env.HTTP_TIMEOUT_MS, APP_CONSTANTS.DEFAULT_HTTP_TIMEOUT_MS);
  if (timeoutMs <= 0) {
    problems.push(`HTTP_TIMEOUT_MS must be a positive integer (got ${timeoutMs})`);
  }

  const { SDWAN_URL, SDWAN_USER, SDWAN_PASS, UPS_USER, UPS_PASS } = required;
  if (problems.length > 0 || !SDWAN_URL || !SDWAN_USER || !SDWAN_PASS || !UPS_USER || !UPS_PASS) {
    throw new ConfigValidationError('Invalid environment', problems);
  }

  const levels = APP_CONSTANTS.LOG_LEVELS;
  const slackWebhook = env.SLACK_WEBHOOK_URL?.trim();

  return {
    SDWAN_URL,
    SDWAN_USER,
    SDWAN_PASS,
    UPS_USER,
    UPS_PASS,
    LOG_LEVEL: parseLogLevel(env.LOG_LEVEL, levels, levels.INFO),
    HTTP_TIMEOUT_MS: timeoutMs,
    TLS_VERIFY: parseBooleanFlag(env.TLS_VERIFY, false),
    SLACK_WEBHOOK_URL: slackWebhook ? slackWebhook : null,
    SLACK_LOG_LEVEL: parseLogLevel(env.SLACK_LOG_LEVEL, levels, levels.WARNING),
    CONFIG_PATH: env.CONFIG_PATH?.trim() || APP_CONSTANTS.DEFAULT_CONFIG_PATH,
  };
}

/**
 * Reads a text file (injected for tests)
 */
export type TextReader = (path: string) => Promise<string>;

const readUtf8: TextReader = (path) => readFile(path, 'utf8');

/**
 * Load and validate the YAML configuration file
 *
 * @param path - File path
 * @param readText - File reader
 * @returns Validation result; `config` is set only when there are no errors
 * @throws {ConfigValidationError} When the file cannot be read or is not valid YAML
 *
 * @example
 * ```typescript
 * const result = await loadConfigFile('./config.yaml');
 * if (!result.valid) result.errors.forEach((e) => console.error(e.message));
 * ```
 */
export async function loadConfigFile(path: string, readText: TextReader = readUtf8): Promise<ConfigValidationResult> {
  let text: string;
  try {
    text = await readText(path);
  } catch (e) {
    throw new ConfigValidationError(`Cannot read configuration file ${path}: ${describeError(e)}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new ConfigValidationError(`Invalid YAML in ${path}: ${describeError(e)}`);
  }

  return validateConfig(raw);
}
