/**
 * Error Response Utilities
 *
 * Helper functions for sending standardized error responses.
 * Routes use these instead of manual res.status().json().
 *
 * @module shared/utils/error-response
 */

import type { Response } from 'express';
import {
  ErrorCode,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  type ApiErrorResponse,
  type ErrorResponseWithStatus,
} from '@relayshare/shared';

/**
 * Create error response object without sending
 *
 * @example
 * const { statusCode, body } = createErrorResponse(ErrorCode.FORBIDDEN);
 * // statusCode: 403
 * // body: { error: "Forbidden", message: "Access denied", code: "FORBIDDEN" }
 */
export function createErrorResponse(
  code: ErrorCode,
  customMessage?: string,
  details?: Record<string, string | number | boolean>
): ErrorResponseWithStatus {
  const statusCode = ERROR_STATUS_CODES[code];
  const body: ApiErrorResponse = {
    error: getHttpStatusName(statusCode),
    message: customMessage ?? ERROR_MESSAGES[code],
    code,
  };

  if (details !== undefined) {
    body.details = details;
  }

  return { statusCode, body };
}

/**
 * Send standardized error response
 *
 * @example
 * sendError(res, ErrorCode.VALIDATION_ERROR, 'update_id is required');
 */
export function sendError(
  res: Response,
  code: ErrorCode,
  customMessage?: string,
  details?: Record<string, string | number | boolean>
): void {
  const { statusCode, body } = createErrorResponse(code, customMessage, details);
  res.status(statusCode).json(body);
}

/**
 * Send 500 Internal Server Error
 *
 * NEVER pass the actual error message - use the safe default.
 */
export function sendInternalError(res: Response): void {
  sendError(res, ErrorCode.INTERNAL_ERROR);
}
