/**
 * Configuration file validator
 *
 * Checks the document parsed from config.yaml and, when it is valid, returns
 * it as a typed WatchdogFileConfig. Every problem is collected so the operator
 * sees the full list in one run.
 */

import type { SiteConfig, TriggerConfig, WatchdogFileConfig } from '$types';
import type { ConfigValidationResult, ValidationError, ValidationWarning } from './types';
import {
  addError,
  validateIntegerRange,
  validateMapping,
  validateNonEmptyString
} from './helpers';

// ═══════════════════════════════════════════════════════════════
// LIMITS
// ═══════════════════════════════════════════════════════════════

export const CONFIG_LIMITS = {
  INTERVAL_MIN: 1,
  INTERVAL_MAX: 86400,
  INTERVAL_RECOMMENDED_MIN: 10,
  COUNT_MIN: 1,
  COUNT_MAX: 100,
  COUNT_RECOMMENDED_MAX: 20,
  OUTLET_MIN: 1,
  OUTLET_MAX: 64
} as const;

const SITE_ID_PATTERN = /^[0-9]+$/;

// ═══════════════════════════════════════════════════════════════
// SECTION VALIDATORS
// ═══════════════════════════════════════════════════════════════

function validateTrigger(
  raw: unknown,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): TriggerConfig | undefined {
  const trigger = validateMapping(raw, 'trigger', errors);
  if (!trigger) return undefined;

  const interval = validateIntegerRange(
    trigger.interval,
    'trigger.interval',
    CONFIG_LIMITS.INTERVAL_MIN,
    CONFIG_LIMITS.INTERVAL_MAX,
    errors,
    warnings,
    CONFIG_LIMITS.INTERVAL_RECOMMENDED_MIN
  );
  const count = validateIntegerRange(
    trigger.count,
    'trigger.count',
    CONFIG_LIMITS.COUNT_MIN,
    CONFIG_LIMITS.COUNT_MAX,
    errors,
    warnings,
    undefined,
    CONFIG_LIMITS.COUNT_RECOMMENDED_MAX
  );

  if (interval === undefined || count === undefined) return undefined;
  return { interval, count };
}

function validateSite(
  key: string,
  raw: unknown,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): SiteConfig | undefined {
  const field = `sites.${key}`;
  const site = validateMapping(raw, field, errors);
  if (!site) return undefined;

  const color = validateNonEmptyString(site.color, `${field}.color`, errors);
  const ups = validateNonEmptyString(site.ups, `${field}.ups`, errors);
  const outlet = validateIntegerRange(
    site.outlet,
    `${field}.outlet`,
    CONFIG_LIMITS.OUTLET_MIN,
    CONFIG_LIMITS.OUTLET_MAX,
    errors,
    warnings
  );

  if (color === undefined || ups === undefined || outlet === undefined) return undefined;
  return { color, ups, outlet };
}

function validateSites(
  raw: unknown,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): Map<number, SiteConfig> | undefined {
  const sites = validateMapping(raw, 'sites', errors);
  if (!sites) return undefined;

  const keys = Object.keys(sites);
  if (keys.length === 0) {
    addError(errors, 'sites', 'sites must define at least one site');
    return undefined;
  }

  const result = new Map<number, SiteConfig>();
  const seen = new Map<number, string>();
  let complete = true;

  for (const key of keys) {
    if (!SITE_ID_PATTERN.test(key)) {
      addError(errors, `sites.${key}`, `Site id must be a non-negative integer (got ${JSON.stringify(key)})`);
      complete = false;
      continue;
    }

    const id = Number(key);
    if (!Number.isSafeInteger(id)) {
      addError(errors, `sites.${key}`, `Site id ${key} is out of range (max ${Number.MAX_SAFE_INTEGER})`);
      complete = false;
      continue;
    }

    // "7" and "007" name the same site
    const previous = seen.get(id);
    if (previous !== undefined) {
      addError(errors, `sites.${key}`, `Duplicate site id ${id} (already defined as sites.${previous})`);
      complete = false;
      continue;
    }
    seen.set(id, key);

    const site = validateSite(key, sites[key], errors, warnings);
    if (site) {
      result.set(id, site);
    } else {
      complete = false;
    }
  }

  return complete ? result : undefined;
}

// ═══════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a parsed configuration document
 *
 * @param raw - Value returned by the YAML loader
 * @returns Validation result, with the typed config when valid
 *
 * @example
 * ```typescript
 * const result = validateConfig(yaml.load(text));
 * if (!result.valid) {
 *   result.errors.forEach((e) => logger.critical(`${e.field}: ${e.message}`));
 * }
 * ```
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const root = validateMapping(raw, 'config', errors);
  let config: WatchdogFileConfig | null = null;

  if (root) {
    const trigger = validateTrigger(root.trigger, errors, warnings);
    const sites = validateSites(root.sites, errors, warnings);

    if (trigger && sites && errors.length === 0) {
      config = { trigger, sites };
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config
  };
}
