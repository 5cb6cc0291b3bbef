/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 *
 * Validators return the narrowed value when it passes the hard limits so the
 * caller can assemble a typed config without re-checking.
 */

import type { ValidationError, ValidationWarning } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';
import { isRecord } from '@utils/http';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

/**
 * Render a rejected value for an error message ("30" stays quoted)
 * @param value - Offending value
 * @returns Printable form
 */
export function describeValue(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a mapping (YAML object)
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 * @returns The mapping, or undefined when invalid
 */
export function validateMapping(
  value: unknown,
  field: string,
  errors: ValidationError[]
): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    addError(errors, field, `${field} is required`);
    return undefined;
  }
  if (!isRecord(value)) {
    addError(errors, field, `${field} must be a mapping (got ${Array.isArray(value) ? 'array' : typeof value})`);
    return undefined;
  }
  return value;
}

/**
 * Validate that a value is a non-empty string
 *
 * YAML reads bare IP addresses such as 10.0.0.5 as strings, but a bare number
 * like 42 arrives as a number and is rejected here.
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 * @returns Trimmed string, or undefined when invalid
 */
export function validateNonEmptyString(
  value: unknown,
  field: string,
  errors: ValidationError[]
): string | undefined {
  if (value === undefined || value === null) {
    addError(errors, field, `${field} is required`);
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    addError(errors, field, `${field} must be a non-empty string (got ${describeValue(value)})`);
    return undefined;
  }
  return value.trim();
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails)
 * Recommended range violations produce warnings (validation passes)
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 * @returns The value when within the critical range, otherwise undefined
 */
export function validateNumberRange(
  value: unknown,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): number | undefined {
  if (value === undefined || value === null) {
    addError(errors, field, `${field} is required`);
    return undefined;
  }

  // Rejects NaN, Infinity and non-numbers such as "30"
  if (!isFiniteNumber(value)) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${describeValue(value)})`
    );
    return undefined;
  }

  if (value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return undefined;
  }

  const belowRecommended = recommendedMin !== undefined && value < recommendedMin;
  const aboveRecommended = recommendedMax !== undefined && value > recommendedMax;
  if (belowRecommended || aboveRecommended) {
    addWarning(
      warnings,
      field,
      `${field} is outside recommended range ${recommendedMin ?? criticalMin}-${recommendedMax ?? criticalMax} (got ${value})`
    );
  }

  return value;
}

/**
 * Validate an integer against critical and recommended ranges
 *
 * First checks if the value is an integer, then validates ranges
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 * @returns The value when valid, otherwise undefined
 */
export function validateIntegerRange(
  value: unknown,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): number | undefined {
  if (isFiniteNumber(value) && !isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return undefined;
  }

  return validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}
