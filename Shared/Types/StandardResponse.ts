import { isBaseError } from './errors.js';

/**
 * Standardized response envelope returned by every tool.
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  error?: string;
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
  data?: T;
}

export function createSuccess<T>(data: T): StandardResponse<T> {
  return { success: true, data };
}

export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): StandardResponse<never> {
  const response: StandardResponse<never> = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create error response from a caught exception.
 * BaseError subclasses keep their code; object details are spread into errorDetails,
 * anything else is kept under `details`.
 */
export function createErrorFromException(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): StandardResponse<never> {
  if (isBaseError(error)) {
    const record = error.toRecord();
    let details: Record<string, unknown> | undefined;
    if (record.details !== undefined) {
      details = isPlainRecord(record.details) ? { ...record.details } : { details: record.details };
    }
    if (includeStack && error.stack) {
      details = { ...(details ?? {}), stack: error.stack };
    }
    return createError(record.message, record.code, details);
  }

  if (error instanceof Error) {
    return createError(
      error.message,
      'INTERNAL_ERROR',
      includeStack && error.stack ? { stack: error.stack } : undefined,
    );
  }

  if (typeof error === 'string') {
    return createError(error, 'UNKNOWN_ERROR');
  }

  return createError(String(error) || 'Unknown error occurred', 'UNKNOWN_ERROR', {
    originalError: error,
  });
}
