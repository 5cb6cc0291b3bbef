/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  describeValue,
  validateIntegerRange,
  validateMapping,
  validateNonEmptyString,
  validateNumberRange
} from './helpers';
import type { ValidationError, ValidationWarning } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      const errors: ValidationError[] = [];

      addError(errors, 'trigger.count', 'Value out of range');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'trigger.count', message: 'Value out of range' }]);
    });

    it('should accumulate multiple errors', () => {
      const errors: ValidationError[] = [];

      addError(errors, 'FIELD1', 'Error 1');
      addError(errors, 'FIELD2', 'Error 2');

      expect(errors.map((e) => e.field)).toEqual(['FIELD1', 'FIELD2']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const warnings: ValidationWarning[] = [];

      addWarning(warnings, 'trigger.interval', 'Polling very fast');

      expect(warnings).toEqual([{ level: 'WARNING', field: 'trigger.interval', message: 'Polling very fast' }]);
    });
  });

  describe('describeValue', () => {
    it('should quote strings and print other values plainly', () => {
      expect(describeValue('30')).toBe('"30"');
      expect(describeValue(30)).toBe('30');
      expect(describeValue(true)).toBe('true');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateMapping()
  // ═══════════════════════════════════════════════════════════════

  describe('validateMapping', () => {
    it('should return objects unchanged', () => {
      const errors: ValidationError[] = [];
      const value = { a: 1 };

      expect(validateMapping(value, 'trigger', errors)).toBe(value);
      expect(errors).toHaveLength(0);
    });

    it('should report missing values as required', () => {
      const errors: ValidationError[] = [];

      expect(validateMapping(null, 'trigger', errors)).toBeUndefined();
      expect(errors[0].message).toBe('trigger is required');
    });

    it('should reject arrays and scalars', () => {
      const errors: ValidationError[] = [];

      validateMapping([1, 2], 'sites', errors);
      validateMapping('x', 'trigger', errors);

      expect(errors.map((e) => e.message)).toEqual([
        'sites must be a mapping (got array)',
        'trigger must be a mapping (got string)'
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateNonEmptyString()
  // ═══════════════════════════════════════════════════════════════

  describe('validateNonEmptyString', () => {
    it('should return the trimmed string', () => {
      const errors: ValidationError[] = [];

      expect(validateNonEmptyString(' biz-internet ', 'sites.1.color', errors)).toBe('biz-internet');
      expect(errors).toHaveLength(0);
    });

    it('should reject blank strings and non-strings', () => {
      const errors: ValidationError[] = [];

      validateNonEmptyString('  ', 'sites.1.color', errors);
      validateNonEmptyString(42, 'sites.1.ups', errors);
      validateNonEmptyString(undefined, 'sites.1.ups', errors);

      expect(errors.map((e) => e.message)).toEqual([
        'sites.1.color must be a non-empty string (got "  ")',
        'sites.1.ups must be a non-empty string (got 42)',
        'sites.1.ups is required'
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateNumberRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateNumberRange', () => {
    let errors: ValidationError[];
    let warnings: ValidationWarning[];

    beforeEach(() => {
      errors = [];
      warnings = [];
    });

    it('should return the value when within range', () => {
      expect(validateNumberRange(5, 'X', 0, 10, errors, warnings)).toBe(5);
      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should accept both boundaries', () => {
      expect(validateNumberRange(0, 'X', 0, 10, errors, warnings)).toBe(0);
      expect(validateNumberRange(10, 'X', 0, 10, errors, warnings)).toBe(10);
      expect(errors).toHaveLength(0);
    });

    it('should error outside the critical range', () => {
      expect(validateNumberRange(11, 'X', 0, 10, errors, warnings)).toBeUndefined();
      expect(errors[0].message).toBe('X must be between 0 and 10 (got 11)');
    });

    it('should error on NaN, Infinity and numeric strings', () => {
      validateNumberRange(NaN, 'X', 0, 10, errors, warnings);
      validateNumberRange(Infinity, 'X', 0, 10, errors, warnings);
      validateNumberRange('5', 'X', 0, 10, errors, warnings);

      expect(errors.map((e) => e.message)).toEqual([
        'X must be between 0 and 10 (got NaN)',
        'X must be between 0 and 10 (got Infinity)',
        'X must be between 0 and 10 (got "5")'
      ]);
    });

    it('should report a missing value as required', () => {
      validateNumberRange(undefined, 'X', 0, 10, errors, warnings);

      expect(errors[0].message).toBe('X is required');
    });

    it('should warn outside the recommended range but still return the value', () => {
      expect(validateNumberRange(2, 'X', 0, 10, errors, warnings, 3, 8)).toBe(2);

      expect(errors).toHaveLength(0);
      expect(warnings[0].message).toBe('X is outside recommended range 3-8 (got 2)');
    });

    it('should use the critical bound when only one recommended bound is given', () => {
      validateNumberRange(25, 'trigger.count', 1, 100, errors, warnings, undefined, 20);

      expect(warnings[0].message).toBe('trigger.count is outside recommended range 1-20 (got 25)');
    });

    it('should not warn when the critical check failed', () => {
      validateNumberRange(-1, 'X', 0, 10, errors, warnings, 3, 8);

      expect(errors).toHaveLength(1);
      expect(warnings).toHaveLength(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateIntegerRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateIntegerRange', () => {
    it('should accept integers within range', () => {
      const errors: ValidationError[] = [];

      expect(validateIntegerRange(3, 'trigger.count', 1, 100, errors, [])).toBe(3);
      expect(errors).toHaveLength(0);
    });

    it('should reject fractional values', () => {
      const errors: ValidationError[] = [];

      expect(validateIntegerRange(2.5, 'sites.1.outlet', 1, 64, errors, [])).toBeUndefined();
      expect(errors[0].message).toBe('sites.1.outlet must be an integer (got 2.5)');
    });

    it('should delegate range checks', () => {
      const errors: ValidationError[] = [];

      validateIntegerRange(65, 'sites.1.outlet', 1, 64, errors, []);

      expect(errors[0].message).toBe('sites.1.outlet must be between 1 and 64 (got 65)');
    });
  });
});
