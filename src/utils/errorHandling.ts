/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks, where the caught value is unknown.
 */

import { ApplicationError } from '../errors/ApplicationError.js';

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Type guard to check if error has a code property (Node.js system errors)
 */
export function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Safely extract error code from unknown error
 */
export function getErrorCode(error: unknown): string | undefined {
  return hasCode(error) ? error.code : undefined;
}

/**
 * Plain-object form of an error as stored in batch results and API payloads
 */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  retryable: boolean;
  jobId?: string;
  stage?: string;
  itemId?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof ApplicationError) {
    const { jobId, stage, itemId } = error.context;
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      ...(jobId !== undefined && { jobId }),
      ...(stage !== undefined && { stage }),
      ...(itemId !== undefined && { itemId }),
    };
  }

  return {
    name: isError(error) ? error.name : 'Error',
    code: getErrorCode(error) ?? 'UNKNOWN',
    message: getErrorMessage(error),
    retryable: false,
  };
}
