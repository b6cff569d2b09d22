/**
 * Error Constants
 *
 * Centralized error codes, user-safe messages and HTTP status mappings.
 * Domain errors in the backend carry one of these codes so that the bot
 * surface and the HTTP surface report failures consistently.
 *
 * @module @relayshare/shared/constants/errors
 */

/**
 * Machine-readable error codes
 */
export enum ErrorCode {
  // 400
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_STATE = 'INVALID_STATE',

  // 401 / 403
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  NOT_SHARE_OWNER = 'NOT_SHARE_OWNER',
  GATE_DENIED = 'GATE_DENIED',

  // 404
  NOT_FOUND = 'NOT_FOUND',
  SHARE_NOT_FOUND = 'SHARE_NOT_FOUND',

  // 5xx
  RELAY_FAILED = 'RELAY_FAILED',
  PERSISTENCE_FAILED = 'PERSISTENCE_FAILED',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

/**
 * Human-readable names for the HTTP statuses used by the service
 */
export const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

/**
 * Default message per error code. Safe to show to end users.
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.BAD_REQUEST]: 'Invalid request',
  [ErrorCode.VALIDATION_ERROR]: 'Request validation failed',
  [ErrorCode.INVALID_STATE]: 'Operation not allowed in the current upload state',
  [ErrorCode.UNAUTHORIZED]: 'Authentication required',
  [ErrorCode.FORBIDDEN]: 'Access denied',
  [ErrorCode.NOT_SHARE_OWNER]: 'Only the owner of a share can do this',
  [ErrorCode.GATE_DENIED]: 'Membership of the required group is needed',
  [ErrorCode.NOT_FOUND]: 'Resource not found',
  [ErrorCode.SHARE_NOT_FOUND]: 'Share not found',
  [ErrorCode.RELAY_FAILED]: 'The file could not be relayed to storage',
  [ErrorCode.PERSISTENCE_FAILED]: 'The share could not be saved, please try again',
  [ErrorCode.TRANSPORT_ERROR]: 'The messaging service rejected the request',
  [ErrorCode.INTERNAL_ERROR]: 'An unexpected error occurred',
  [ErrorCode.SERVICE_UNAVAILABLE]: 'Service temporarily unavailable',
};

/**
 * HTTP status code per error code
 */
export const ERROR_STATUS_CODES: Record<ErrorCode, number> = {
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_STATE]: 409,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.NOT_SHARE_OWNER]: 403,
  [ErrorCode.GATE_DENIED]: 403,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.SHARE_NOT_FOUND]: 404,
  [ErrorCode.RELAY_FAILED]: 502,
  [ErrorCode.PERSISTENCE_FAILED]: 503,
  [ErrorCode.TRANSPORT_ERROR]: 502,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
};

export function getHttpStatusName(statusCode: number): string {
  return HTTP_STATUS_NAMES[statusCode] ?? 'Error';
}

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

export function getErrorStatusCode(code: ErrorCode): number {
  return ERROR_STATUS_CODES[code];
}
