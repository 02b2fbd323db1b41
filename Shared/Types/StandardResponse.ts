import { BaseError } from './errors.js';

/**
 * Envelope returned by every MCP tool in this project.
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

/**
 * Create an error response, optionally with a structured error code and details.
 */
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

/**
 * Create an error response from a caught exception.
 * BaseError subclasses keep their code and details; stacks are only
 * attached outside production so callers never see backend internals there.
 */
export function createErrorFromException(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): StandardResponse<never> {
  if (error instanceof BaseError) {
    const details: Record<string, unknown> = { ...error.details };
    if (includeStack && error.stack) details.stack = error.stack;
    return createError(
      error.message,
      error.code,
      Object.keys(details).length > 0 ? details : undefined,
    );
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

  return createError(String(error) || 'Unknown error occurred', 'UNKNOWN_ERROR');
}
