/**
 * Error Response Utilities
 *
 * Centralized error response creation so every endpoint answers errors in the
 * same JSON shape.
 */

import { StatusCodes } from 'http-status-codes';
import type { ErrorResponse } from '../types.js';

export type { ErrorResponse };

/**
 * Error codes used across the API
 */
export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

const ERROR_STATUS_CODES: Record<ErrorCode, number> = {
  [ErrorCode.NOT_FOUND]: StatusCodes.NOT_FOUND,
  [ErrorCode.INTERNAL_ERROR]: StatusCodes.INTERNAL_SERVER_ERROR,
};

/**
 * Create a standardized error response object
 *
 * @param requestId - Optional request ID for tracking
 */
export function createErrorResponse(
  errorCode: ErrorCode,
  message: string,
  requestId?: string
): ErrorResponse {
  return {
    error: errorCode,
    message,
    ...(requestId !== undefined && requestId.length > 0 && { requestId }),
    timestamp: new Date().toISOString(),
  };
}

/**
 * HTTP status code for an error code
 */
export function getStatusCode(errorCode: ErrorCode): number {
  return ERROR_STATUS_CODES[errorCode];
}

export const ErrorResponses = {
  notFound: (resource: string, requestId?: string) =>
    createErrorResponse(ErrorCode.NOT_FOUND, `${resource} not found`, requestId),

  internalError: (message = 'An internal error occurred', requestId?: string) =>
    createErrorResponse(ErrorCode.INTERNAL_ERROR, message, requestId),
};
