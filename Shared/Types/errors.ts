/**
 * Base error class for all Fusion packages.
 * Every error carries a machine-readable code plus optional structured details.
 */

export interface ErrorRecord {
  name: string;
  code: string;
  message: string;
  details?: unknown;
}

export class BaseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Plain-object form, safe for JSON serialization and log lines.
   */
  toRecord(): ErrorRecord {
    const record: ErrorRecord = { name: this.name, code: this.code, message: this.message };
    if (this.details !== undefined) record.details = this.details;
    return record;
  }
}

/**
 * Configuration-related errors (invalid env vars, bad config values)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input validation errors (invalid parameters, schema validation failures)
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'TIMEOUT_ERROR', details);
    this.name = 'TimeoutError';
  }
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}
