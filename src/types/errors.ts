/**
 * Global error types for the watchdog
 * Custom errors for validation, authentication and transport failures
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the configuration file is missing, unreadable or invalid
 */
export class ConfigValidationError extends ValidationError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

/**
 * Error thrown when a liveness window is created with an invalid size
 */
export class WindowValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'WindowValidationError';
  }
}

/**
 * Error thrown when power-cycle timing or retry settings are invalid
 */
export class PowerCycleValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'PowerCycleValidationError';
  }
}

/**
 * Error thrown when a management API rejects our credentials
 */
export class AuthenticationError extends Error {
  readonly target: string;

  constructor(target: string, message: string) {
    super(message);
    this.name = 'AuthenticationError';
    this.target = target;
  }
}

/**
 * Error thrown when an HTTP call returns a non-success status
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpError';
    this.status = status;
  }
}

/**
 * Error thrown when an HTTP call exceeds its timeout
 */
export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Render any thrown value as a one-line message
 * @param err - Caught value
 * @returns Error message or string form of the value
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
