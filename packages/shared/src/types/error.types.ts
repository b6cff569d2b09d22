/**
 * Error Response Type Definitions
 *
 * Types for standardized API error responses.
 *
 * @module @relayshare/shared/types/error
 */

import { ErrorCode } from '../constants/errors';

/**
 * Standard API Error Response
 *
 * @example
 * {
 *   "error": "Forbidden",
 *   "message": "Access denied",
 *   "code": "FORBIDDEN"
 * }
 */
export interface ApiErrorResponse {
  /** Human-readable HTTP status name */
  error: string;

  /** Message safe for display to end users */
  message: string;

  /** Machine-readable error code */
  code: ErrorCode;

  details?: Record<string, string | number | boolean>;
}

/**
 * Error response paired with its HTTP status, built without sending it
 */
export interface ErrorResponseWithStatus {
  statusCode: number;
  body: ApiErrorResponse;
}

/**
 * Type guard to check if error code exists
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.values<string>(ErrorCode).includes(code);
}
