import type { WatchdogFileConfig } from '$types';

export interface ValidationError {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationWarning {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Result of validating the parsed YAML document
 * `config` is only present when `valid` is true
 */
export interface ConfigValidationResult extends ValidationResult {
  config: WatchdogFileConfig | null;
}
